/**
 * Image Reference Resolver
 *
 * Derives the registry coordinate of the image built for a commit and checks
 * that it exists. The tag is always `sha-` plus the 8-character short hash,
 * so a fresh deploy and a later rollback of the same commit address the same
 * image, which is what lets promotion re-tag instead of rebuild.
 */

import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import type { ImageRegistry } from '../providers/types.js';
import { shortHash } from './CommitRef.js';
import { NotFoundError, RegistryUnreachableError } from './errors.js';
import type { Environment, ImageCheck, ImageReference, ResolvedCommit } from './types.js';

export const IMAGE_TAG_PREFIX = 'sha-';

export interface ImageCoordinates {
  registry: string;
  repository: string;
}

export function imageTag(commit: Pick<ResolvedCommit, 'hash'>): string {
  return `${IMAGE_TAG_PREFIX}${shortHash(commit.hash.toLowerCase())}`;
}

export function formatImageReference(ref: ImageReference): string {
  return `${ref.registry}/${ref.repository}:${ref.tag}`;
}

export class ImageReferenceResolver {
  private readonly logger: Logger;

  constructor(
    private readonly coordinates: ImageCoordinates,
    private readonly registry: ImageRegistry
  ) {
    this.logger = getLogger('image-resolver');
  }

  /**
   * Pure derivation; no I/O.
   */
  resolve(commit: Pick<ResolvedCommit, 'hash'>): ImageReference {
    return {
      registry: this.coordinates.registry,
      repository: this.coordinates.repository,
      tag: imageTag(commit),
    };
  }

  exists(ref: ImageReference): Promise<boolean> {
    return this.registry.exists(ref);
  }

  /**
   * Verify the image for a promotion target.
   *
   * - missing image: NotFoundError for every environment
   * - registry unreachable: hard block for prod, warning for dev/staging
   */
  async validate(environment: Environment, ref: ImageReference): Promise<ImageCheck> {
    const display = formatImageReference(ref);
    let found: boolean;
    try {
      found = await this.exists(ref);
    } catch (err) {
      if (!(err instanceof RegistryUnreachableError)) throw err;
      if (environment === 'prod') {
        throw err;
      }
      this.logger.warn(`Registry unreachable; proceeding without verifying ${display}`, {
        environment,
        reason: err.message,
      });
      return { status: 'unverified', reason: err.message };
    }

    if (!found) {
      throw new NotFoundError('image', display, `Image ${display} does not exist in the registry`);
    }
    this.logger.debug('Image verified', { image: display });
    return { status: 'verified' };
  }
}
