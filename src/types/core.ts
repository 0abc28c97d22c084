/**
 * Core data types for the Weather Analytics Engine
 * These interfaces define the fundamental data structures used throughout the engine
 */

// Geographic and location types
export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface Location extends Coordinates {
  locationId: string;
  name: string;
  district: string;
  state?: string;
  elevation: number | null; // meters, null when unknown
}

export interface NearbyLocation {
  location: Location;
  distanceKm: number;
}

// Enumeration types
export enum AlertCategory {
  FLOOD_RISK = 'flood-risk',
  HEAT_ADVISORY = 'heat-advisory',
  FROST_WARNING = 'frost-warning',
  IRRIGATION_ADVISORY = 'irrigation-advisory',
  DISEASE_RISK = 'disease-risk'
}

export enum AlertSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  EXTREME = 'extreme'
}

export enum AlertState {
  ACTIVE = 'active',
  RESOLVED = 'resolved'
}

export enum MetricKind {
  HEAT_STRESS_INDEX = 'heat-stress-index',
  SOIL_MOISTURE_CATEGORY = 'soil-moisture-category',
  GROWING_DEGREE_DAYS = 'growing-degree-days',
  FROST_RISK = 'frost-risk',
  DISEASE_RISK = 'disease-risk',
  SOIL_TEMPERATURE_STATUS = 'soil-temperature-status'
}

export enum HeatStressCategory {
  NONE = 'none',
  MODERATE = 'moderate',
  SEVERE = 'severe',
  EXTREME = 'extreme'
}

export enum SoilMoistureCategory {
  DRY = 'dry',
  OPTIMAL = 'optimal',
  SATURATED = 'saturated'
}

export enum SoilTemperatureStatus {
  COLD = 'cold',
  OPTIMAL = 'optimal',
  HOT = 'hot'
}

// Stresses a crop faces under the current conditions
export enum RiskFactor {
  COLD_STRESS = 'cold-stress',
  HEAT_STRESS = 'heat-stress',
  DISEASE = 'disease',
  DROUGHT_STRESS = 'drought-stress'
}

export type Trend = 'increasing' | 'decreasing' | 'stable';

// Inclusive time window
export interface DateRange {
  from: Date;
  to: Date;
}

// Validation result type
export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

// Injected time source; components never read the wall clock directly
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
