/**
 * Profile Registry
 *
 * Extraction profiles keyed by id. Each registered profile gets one shared
 * FieldExtractor, built (and its record schema compiled) at registration.
 */

import type { ExtractionProfile } from './types';
import { FieldExtractor } from './field-extractor';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';

const profileRegistry = new Map<string, FieldExtractor>();

/**
 * Register a profile. Overwrites any existing profile with the same id.
 */
export function registerProfile(profile: ExtractionProfile): void {
  profileRegistry.set(profile.id, new FieldExtractor(profile));

  logger.debug('Registered extraction profile', {
    profile: profile.id,
    columns: profile.schema.names.length,
    description: profile.description,
  });
}

export function getProfile(id: string): ExtractionProfile | undefined {
  return profileRegistry.get(id)?.profile;
}

/**
 * @throws ConfigurationError if no profile is registered under that id
 */
export function getProfileOrThrow(id: string): ExtractionProfile {
  return getExtractorOrThrow(id).profile;
}

/**
 * @throws ConfigurationError if no profile is registered under that id
 */
export function getExtractorOrThrow(id: string): FieldExtractor {
  const extractor = profileRegistry.get(id);
  if (!extractor) {
    throw new ConfigurationError(`No extraction profile registered with id: ${id}`);
  }
  return extractor;
}

export function hasProfile(id: string): boolean {
  return profileRegistry.has(id);
}

export function getRegisteredProfiles(): ExtractionProfile[] {
  return Array.from(profileRegistry.values(), extractor => extractor.profile);
}

/**
 * Clear all registered profiles.
 * Useful for testing.
 */
export function clearRegistry(): void {
  profileRegistry.clear();
}
