/**
 * qualityProfiles.ts — Named viewport / scale presets for page snapshots.
 *
 * A cause list is a long table, so the full-page screenshot height follows the
 * document; the profile only fixes the viewport width (which decides how the
 * table wraps) and the pixel density (which decides legibility on a phone).
 */

import type { QualityProfile, QualityProfileName } from './types';

export const QUALITY_PROFILES: Record<QualityProfileName, QualityProfile> = {
  low: { name: 'low', width: 800, height: 600, deviceScaleFactor: 1 },
  medium: { name: 'medium', width: 1280, height: 720, deviceScaleFactor: 1 },
  high: { name: 'high', width: 1920, height: 1080, deviceScaleFactor: 2 },
};

export function getQualityProfile(name: QualityProfileName): QualityProfile {
  return QUALITY_PROFILES[name];
}
