import { ConfigurationError } from '../errors.js';
import { becdProfile } from './becd.js';
import { carbenmatsProfile } from './carbenmats.js';
import type { DatasetProfile } from './profile.js';
import { sliceProfile } from './slice.js';
import { structuralPandaProfile } from './structural_panda.js';

export type { DatasetProfile } from './profile.js';

export const DATASET_PROFILES: readonly DatasetProfile[] = [
  becdProfile,
  carbenmatsProfile,
  sliceProfile,
  structuralPandaProfile
];

export function getProfile(name: string): DatasetProfile {
  const normalized = name.trim().toLowerCase().replace(/-/g, '_');
  const profile = DATASET_PROFILES.find((candidate) => candidate.name === normalized);
  if (!profile) {
    throw new ConfigurationError('Unknown dataset', {
      dataset: name,
      known: DATASET_PROFILES.map((candidate) => candidate.name)
    });
  }
  return profile;
}
