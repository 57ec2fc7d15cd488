// packages/list-core/src/wordSampler.ts
//
// Picks a uniform random subset of words from a one-word-per-line text file
// in a single streaming pass (reservoir sampling). Memory grows with the
// sample size, never with the file size.
//
// Each line is trimmed and lowercased; blank lines are skipped and do not
// count towards the reservoir. The order of the returned words is an artifact
// of sampling and carries no meaning.

import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  EmptyWordListError,
  InvalidSampleSizeError,
  ResourceNotFoundError,
  isErrnoException,
} from './errors.js';
import { samplerLogger as log } from './logger.js';
import { defaultRandom, randomInt, seededRandom, type RandomSource } from './random.js';

/** Word lists bundled with this package. */
export const DEFAULT_RESOURCE_DIR = fileURLToPath(new URL('../resources/', import.meta.url));

export interface WordSamplerOptions {
  /** Directory the resource name is resolved against. */
  resourceDir?: string;
  /** Overrides `seed`. */
  random?: RandomSource;
  /** Makes every sampler built with it draw the same sequence. */
  seed?: string;
}

/**
 * sampleReservoir runs classic reservoir sampling over a stream of lines.
 *
 * The i-th qualifying line (0-based) is kept outright while fewer than
 * `count` words are held. After that a slot j is drawn from [0, i] and the
 * line replaces slot j when j < count, so every qualifying line ends up in
 * the sample with probability count / total.
 *
 * @returns the reservoir; empty when no line qualified or count is 0
 */
export async function sampleReservoir(
  lines: Iterable<string> | AsyncIterable<string>,
  count: number,
  random: RandomSource = defaultRandom,
): Promise<string[]> {
  assertSampleSize(count);

  const reservoir: string[] = [];
  let seen = 0;

  for await (const line of lines) {
    const word = line.trim().toLowerCase();
    if (!word) continue;

    if (seen < count) {
      reservoir.push(word);
    } else {
      const slot = randomInt(random, seen);
      if (slot < count) reservoir[slot] = word;
    }
    seen++;
  }

  return reservoir;
}

function assertSampleSize(count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidSampleSizeError(count);
  }
}

export class WordSampler {
  readonly resource: string;
  readonly resourcePath: string;
  private readonly random: RandomSource;

  constructor(resource: string, options: WordSamplerOptions = {}) {
    this.resource = resource;
    this.resourcePath = path.resolve(options.resourceDir ?? DEFAULT_RESOURCE_DIR, resource);
    this.random =
      options.random ?? (options.seed !== undefined ? seededRandom(options.seed) : defaultRandom);
  }

  /**
   * getRandomWords returns up to `count` random words from the resource.
   * A resource with fewer qualifying lines than `count` yields all of them.
   *
   * @throws InvalidSampleSizeError if count is not a non-negative integer
   * @throws ResourceNotFoundError if the resource does not exist
   * @throws EmptyWordListError if no word was sampled
   */
  async getRandomWords(count: number): Promise<string[]> {
    assertSampleSize(count);

    const handle = await this.openResource();
    const started = Date.now();
    let reservoir: string[];
    try {
      reservoir = await sampleReservoir(
        handle.readLines({ encoding: 'utf8', autoClose: false }),
        count,
        this.random,
      );
    } finally {
      await handle.close();
    }

    if (reservoir.length === 0) {
      log.warn({ resource: this.resource, count }, 'Sampling produced no words');
      throw new EmptyWordListError(this.resource);
    }

    log.debug(
      { resource: this.resource, requested: count, sampled: reservoir.length, duration: Date.now() - started },
      'Sampled words',
    );
    return reservoir;
  }

  private async openResource(): Promise<FileHandle> {
    try {
      return await open(this.resourcePath, 'r');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        log.warn({ resource: this.resource, path: this.resourcePath }, 'Word list resource not found');
        throw new ResourceNotFoundError(this.resource, this.resourcePath, { cause: err });
      }
      throw err;
    }
  }
}
