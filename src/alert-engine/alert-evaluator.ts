/**
 * Alert Evaluator
 * Applies the ordered alert rules to a location and moves each (location, category)
 * alert through None -> Active -> Resolved. Transitions for one pair are serialized.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AggregatedForecast,
  Alert,
  AlertCategory,
  AlertState,
  AlertTransitionType,
  Clock,
  EvaluationOutcome,
  Reading,
  compareSeverity,
  systemClock,
} from '../types';
import { EngineConfig } from '../shared/config/environment';
import { Logger } from '../shared/utils/logger';
import { CallOptions } from '../shared/utils/deadline';
import { NotFoundError } from '../shared/utils/errors';
import { assertLocationId } from '../shared/utils/validation';
import { startOfUtcDay, subtractDays } from '../shared/utils/dates';
import { KeyedMutex } from '../shared/utils/keyed-mutex';
import { CachedRepository } from '../data-access/cached-repository';
import { MetricsEngine } from '../metrics-engine/metrics-engine';
import { ForecastAggregator } from '../forecast-engine/forecast-aggregator';
import { ALERT_RULES, AlertRule, RuleContext, RuleOutcome } from './alert-rules';
import { AlertHistoryLog, InMemoryAlertHistoryLog } from './alert-history';

// Today and tomorrow cover the flood-risk look-ahead
const FORECAST_LOOKAHEAD_DAYS = 2;

export interface EvaluateOptions extends CallOptions {
  cropId?: string;
}

export interface AlertEvaluatorDependencies {
  repository: CachedRepository;
  metrics: MetricsEngine;
  forecasts: ForecastAggregator;
  config: EngineConfig;
  logger: Logger;
  clock?: Clock;
  history?: AlertHistoryLog;
  rules?: readonly AlertRule[];
  generateId?: () => string;
}

function sameActions(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((action, i) => action === b[i]);
}

export class AlertEvaluator {
  private readonly repository: CachedRepository;
  private readonly metrics: MetricsEngine;
  private readonly forecasts: ForecastAggregator;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly rules: readonly AlertRule[];
  private readonly generateId: () => string;
  private readonly history: AlertHistoryLog | null;
  private readonly mutex = new KeyedMutex();

  constructor(deps: AlertEvaluatorDependencies) {
    this.repository = deps.repository;
    this.metrics = deps.metrics;
    this.forecasts = deps.forecasts;
    this.config = deps.config;
    this.logger = deps.logger.child({ component: 'AlertEvaluator' });
    this.clock = deps.clock ?? systemClock;
    this.rules = deps.rules ?? ALERT_RULES;
    this.generateId = deps.generateId ?? (() => uuidv4());

    if (this.config.alertHistoryEnabled) {
      this.history = deps.history ?? new InMemoryAlertHistoryLog();
    } else {
      this.history = null;
      if (deps.history) {
        this.logger.warn('Alert history log supplied but alertHistoryEnabled is false; transitions will not be recorded');
      }
    }
  }

  get historyLog(): AlertHistoryLog | null {
    return this.history;
  }

  /**
   * Run every rule for a location, in priority order
   */
  async evaluate(locationId: string, options: EvaluateOptions = {}): Promise<EvaluationOutcome> {
    assertLocationId(locationId);
    const startTime = Date.now();
    const now = this.clock();

    // Unknown locations and unknown crops fail before anything is evaluated
    await this.repository.getLocation(locationId, options);
    const profile = this.metrics.resolveProfile(options.cropId);

    const context = await this.loadContext(locationId, now, options);
    const outcome: EvaluationOutcome = {
      locationId,
      evaluatedAt: now,
      created: [],
      updated: [],
      resolved: [],
      unchanged: [],
      skippedRules: [],
    };

    const ruleContext: RuleContext = {
      ...context,
      locationId,
      now,
      metrics: this.metrics.computeMetrics({
        locationId,
        current: context.current,
        history: context.history,
        window: { from: context.historyFrom, to: now },
        computedAt: now,
        cropId: options.cropId,
      }),
      moisture: profile.moisture,
      thresholds: this.config.alertThresholds,
    };

    for (const rule of this.rules) {
      await this.applyRule(rule, rule.evaluate(ruleContext), ruleContext, outcome, options);
    }

    this.logger.performance('evaluateAlerts', Date.now() - startTime, {
      locationId,
      created: outcome.created.length,
      updated: outcome.updated.length,
      resolved: outcome.resolved.length,
      skipped: outcome.skippedRules.length,
    });
    return outcome;
  }

  /**
   * Manual resolution. Resolving an already resolved alert returns it unchanged.
   */
  async resolve(alertId: string, notes?: string, options: CallOptions = {}): Promise<Alert> {
    const alert = await this.repository.getAlert(alertId, options);

    return this.mutex.withLock(this.lockKey(alert.locationId, alert.category), async () => {
      // Re-read under the lock: an evaluation may have resolved it meanwhile
      const latest = await this.repository.getAlert(alertId, options);
      if (latest.state === AlertState.RESOLVED) {
        this.logger.debug('Alert already resolved', { alertId, locationId: latest.locationId });
        return latest;
      }

      const now = this.clock();
      const resolved: Alert = {
        ...latest,
        state: AlertState.RESOLVED,
        resolvedAt: now,
        updatedAt: now,
        resolutionNotes: notes ?? latest.resolutionNotes,
      };
      await this.repository.saveAlert(resolved, options);
      await this.recordTransition(resolved, 'resolved', now, true);
      return resolved;
    });
  }

  private async loadContext(
    locationId: string,
    now: Date,
    options: CallOptions
  ): Promise<{ current: Reading | null; history: Reading[]; historyFrom: Date; forecast: AggregatedForecast[] }> {
    const historyDays = this.config.alertThresholds.dryConsecutiveDays * 2;
    const historyFrom = startOfUtcDay(subtractDays(now, historyDays - 1));

    const [current, history, forecast] = await Promise.all([
      this.loadCurrent(locationId, options),
      this.repository.getHistory(locationId, historyFrom, now, options),
      this.forecasts.aggregate(locationId, FORECAST_LOOKAHEAD_DAYS, options),
    ]);

    return { current, history: history.data, historyFrom, forecast };
  }

  private async loadCurrent(locationId: string, options: CallOptions): Promise<Reading | null> {
    try {
      const read = await this.repository.getCurrent(locationId, options);
      return read.data;
    } catch (error) {
      if (error instanceof NotFoundError) return null;
      throw error;
    }
  }

  private async applyRule(
    rule: AlertRule,
    ruleOutcome: RuleOutcome,
    context: RuleContext,
    outcome: EvaluationOutcome,
    options: CallOptions
  ): Promise<void> {
    const { locationId, now } = context;

    await this.mutex.withLock(this.lockKey(locationId, rule.category), async () => {
      const active = await this.repository.listActiveAlerts(locationId, options);
      const existing = active.data.find(alert => alert.category === rule.category);

      if (active.stale) {
        // Acting on a stale projection could create a second active alert
        outcome.skippedRules.push({ category: rule.category, reason: 'Active alerts served from stale cache' });
        if (existing) outcome.unchanged.push(existing);
        return;
      }

      if (ruleOutcome.status === 'unavailable') {
        outcome.skippedRules.push({ category: rule.category, reason: ruleOutcome.reason });
        if (existing) outcome.unchanged.push(existing);
        return;
      }

      if (ruleOutcome.status === 'clear') {
        if (!existing) return;
        const resolved: Alert = { ...existing, state: AlertState.RESOLVED, resolvedAt: now, updatedAt: now };
        await this.repository.saveAlert(resolved, options);
        await this.recordTransition(resolved, 'resolved', now, false);
        outcome.resolved.push(resolved);
        return;
      }

      if (!existing) {
        const created: Alert = {
          alertId: this.generateId(),
          locationId,
          category: rule.category,
          severity: ruleOutcome.severity,
          condition: ruleOutcome.condition,
          recommendedActions: ruleOutcome.recommendedActions,
          state: AlertState.ACTIVE,
          createdAt: now,
          updatedAt: now,
          resolvedAt: null,
        };
        await this.repository.saveAlert(created, options);
        await this.recordTransition(created, 'created', now, false);
        outcome.created.push(created);
        return;
      }

      if (
        existing.severity === ruleOutcome.severity &&
        existing.condition === ruleOutcome.condition &&
        sameActions(existing.recommendedActions, ruleOutcome.recommendedActions)
      ) {
        outcome.unchanged.push(existing);
        return;
      }

      const updated: Alert = {
        ...existing,
        severity: ruleOutcome.severity,
        condition: ruleOutcome.condition,
        recommendedActions: ruleOutcome.recommendedActions,
        updatedAt: now,
      };
      await this.repository.saveAlert(updated, options);
      await this.recordTransition(updated, 'updated', now, false);
      const direction = compareSeverity(updated.severity, existing.severity);
      if (direction !== 0) {
        this.logger.info(direction > 0 ? 'Alert escalated' : 'Alert de-escalated', {
          alertId: updated.alertId,
          from: existing.severity,
          to: updated.severity,
        });
      }
      outcome.updated.push(updated);
    });
  }

  private lockKey(locationId: string, category: AlertCategory): string {
    return `${locationId}:${category}`;
  }

  private async recordTransition(alert: Alert, type: AlertTransitionType, at: Date, manual: boolean): Promise<void> {
    this.logger.audit(`alert-${type}`, alert.alertId, {
      locationId: alert.locationId,
      category: alert.category,
      severity: alert.severity,
      manual,
    });

    if (this.history) {
      await this.history.record({
        entryId: uuidv4(),
        alertId: alert.alertId,
        locationId: alert.locationId,
        category: alert.category,
        type,
        severity: alert.severity,
        at,
        manual,
      });
    }
  }
}
