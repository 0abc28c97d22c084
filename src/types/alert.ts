/**
 * Alert models
 * An alert is a single entity per (location, category) moving through
 * None -> Active -> Resolved; the persistence layer stores the current projection
 */

import { AlertCategory, AlertSeverity, AlertState } from './core';

export interface Alert {
  alertId: string;
  locationId: string;
  category: AlertCategory;
  severity: AlertSeverity;
  condition: string; // human-readable triggering condition
  recommendedActions: string[];
  state: AlertState;
  createdAt: Date;
  updatedAt: Date;
  resolvedAt: Date | null;
  resolutionNotes?: string;
}

export type AlertTransitionType = 'created' | 'updated' | 'resolved';

export interface AlertTransition {
  entryId: string;
  alertId: string;
  locationId: string;
  category: AlertCategory;
  type: AlertTransitionType;
  severity: AlertSeverity;
  at: Date;
  manual: boolean;
}

export interface EvaluationOutcome {
  locationId: string;
  evaluatedAt: Date;
  created: Alert[];
  updated: Alert[];
  resolved: Alert[];
  unchanged: Alert[];
  skippedRules: Array<{ category: AlertCategory; reason: string }>;
}

const SEVERITY_RANK: Record<AlertSeverity, number> = {
  [AlertSeverity.LOW]: 1,
  [AlertSeverity.MEDIUM]: 2,
  [AlertSeverity.HIGH]: 3,
  [AlertSeverity.EXTREME]: 4,
};

export function compareSeverity(a: AlertSeverity, b: AlertSeverity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}
