/**
 * Crop profiles
 * Per-crop base temperature, soil-moisture thresholds and growing bands
 */

import { CropGrowingBands, CropProfile, SoilMoistureThresholds } from '../types';
import { AGRONOMY_DEFAULTS } from '../shared/config/constants';
import { ConfigurationError, NotFoundError } from '../shared/utils/errors';

export interface CropProfileProvider {
  getProfile(cropId: string): CropProfile | undefined;
}

export const DEFAULT_MOISTURE_THRESHOLDS: SoilMoistureThresholds = {
  dryBelow: AGRONOMY_DEFAULTS.DRY_BELOW,
  saturatedAbove: AGRONOMY_DEFAULTS.SATURATED_ABOVE,
};

export const DEFAULT_CROP_PROFILE: CropProfile = {
  cropId: 'default',
  displayName: 'Generic crop',
  baseTemperature: AGRONOMY_DEFAULTS.BASE_TEMPERATURE,
  moisture: DEFAULT_MOISTURE_THRESHOLDS,
};

export const BUILT_IN_CROP_PROFILES: CropProfile[] = [
  {
    cropId: 'tomato',
    displayName: 'Tomato',
    baseTemperature: 10,
    moisture: { dryBelow: 35, saturatedAbove: 75 },
    growing: { minTemperature: 18, maxTemperature: 30, minHumidity: 50, maxHumidity: 80 },
  },
  {
    cropId: 'potato',
    displayName: 'Potato',
    baseTemperature: 7,
    moisture: { dryBelow: 30, saturatedAbove: 70 },
    growing: { minTemperature: 15, maxTemperature: 25, minHumidity: 60, maxHumidity: 80 },
  },
  {
    cropId: 'cauliflower',
    displayName: 'Cauliflower',
    baseTemperature: 5,
    moisture: { dryBelow: 35, saturatedAbove: 70 },
    growing: { minTemperature: 12, maxTemperature: 25, minHumidity: 60, maxHumidity: 85 },
  },
  {
    cropId: 'cucumber',
    displayName: 'Cucumber',
    baseTemperature: 12,
    moisture: { dryBelow: 40, saturatedAbove: 80 },
    growing: { minTemperature: 18, maxTemperature: 32, minHumidity: 60, maxHumidity: 85 },
  },
  {
    cropId: 'wheat',
    displayName: 'Wheat',
    baseTemperature: 4.5,
    moisture: { dryBelow: 25, saturatedAbove: 65 },
    growing: { minTemperature: 12, maxTemperature: 25, minHumidity: 40, maxHumidity: 70 },
  },
  {
    cropId: 'rice',
    displayName: 'Rice',
    baseTemperature: 10,
    moisture: { dryBelow: 50, saturatedAbove: 95 },
    growing: { minTemperature: 20, maxTemperature: 35, minHumidity: 60, maxHumidity: 90 },
  },
];

/**
 * Reject thresholds that cannot partition 0-100 %
 */
export function validateMoistureThresholds(thresholds: SoilMoistureThresholds, subject = 'soil moisture'): void {
  const { dryBelow, saturatedAbove } = thresholds;
  if (!Number.isFinite(dryBelow) || !Number.isFinite(saturatedAbove) ||
      dryBelow < 0 || saturatedAbove > 100 || dryBelow >= saturatedAbove) {
    throw new ConfigurationError(
      `Invalid ${subject} thresholds: need 0 <= dryBelow < saturatedAbove <= 100, got ${dryBelow} and ${saturatedAbove}`,
      { dryBelow, saturatedAbove }
    );
  }
}

export function validateGrowingBands(bands: CropGrowingBands, cropId: string): void {
  const { minTemperature, maxTemperature, minHumidity, maxHumidity } = bands;
  const finite = [minTemperature, maxTemperature, minHumidity, maxHumidity].every(Number.isFinite);
  if (!finite || minTemperature >= maxTemperature || minHumidity < 0 || maxHumidity > 100 || minHumidity >= maxHumidity) {
    throw new ConfigurationError(`Invalid growing bands for crop ${cropId}`, { cropId, ...bands });
  }
}

function validateProfile(profile: CropProfile): void {
  validateMoistureThresholds(profile.moisture, `${profile.cropId} moisture`);
  if (profile.growing) validateGrowingBands(profile.growing, profile.cropId);
}

export class StaticCropProfileProvider implements CropProfileProvider {
  private profiles = new Map<string, CropProfile>();

  constructor(profiles: CropProfile[] = BUILT_IN_CROP_PROFILES) {
    for (const profile of profiles) {
      validateProfile(profile);
      if (!Number.isFinite(profile.baseTemperature)) {
        throw new ConfigurationError(`Invalid base temperature for crop ${profile.cropId}`, {
          cropId: profile.cropId,
        });
      }
      this.profiles.set(profile.cropId.toLowerCase(), profile);
    }
  }

  getProfile(cropId: string): CropProfile | undefined {
    return this.profiles.get(cropId.toLowerCase());
  }

  listCropIds(): string[] {
    return [...this.profiles.keys()].sort();
  }
}

/**
 * No crop id means generic defaults; an unknown crop id is an error, never a silent default
 */
export function resolveCropProfile(provider: CropProfileProvider, cropId?: string): CropProfile {
  if (cropId === undefined) return DEFAULT_CROP_PROFILE;
  const profile = provider.getProfile(cropId);
  if (!profile) {
    throw new NotFoundError('Crop profile', cropId);
  }
  validateProfile(profile);
  return profile;
}
