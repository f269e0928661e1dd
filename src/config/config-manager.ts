/**
 * Configuration Manager
 *
 * Centralizes configuration management with validation,
 * defaults, and type-safe access to config values.
 */

import { safeValidateData, PluginConfigSchema } from '../api/flameconnect-schemas';
import {
  DEFAULT_UPDATE_INTERVAL_MINUTES,
  DEFAULT_FORCE_UPDATE_DELAY_MS,
  DEFAULT_TIMER_DURATION_MINUTES,
  MAX_TIMER_DURATION_MINUTES,
  ONE_MINUTE_MS,
  ONE_SECOND_MS,
} from '../constants';

export interface PluginConfig {
    // Platform identification
    platform: string;
    name?: string;

    // Flame Connect account
    email?: string;
    password?: string;

    // Update intervals
    updateIntervalInMinutes?: number;
    forceUpdateDelay?: number;

    // Fire exclusions
    excludedFiresByFireId?: string[];

    // Feature toggles
    showPulsatingEffect?: boolean;
    showMediaLight?: boolean;
    showOverheadLight?: boolean;
    showBoostMode?: boolean;
    showTimer?: boolean;
    showExtraFeatures?: boolean; // Legacy

    timerDurationMinutes?: number;
}

export interface FeatureToggles {
    pulsatingEffect: boolean;
    mediaLight: boolean;
    overheadLight: boolean;
    boostMode: boolean;
    timer: boolean;
}

export interface NormalizedConfig {
    updateIntervalMs: number;
    forceUpdateDelayMs: number;
    excludedFireIds: Set<string>;
    features: FeatureToggles;
    timerDurationMinutes: number;
}

export interface ConfigValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

export class ConfigManager {
  private readonly config: PluginConfig;
  private normalized: NormalizedConfig | null = null;

  constructor(config: PluginConfig) {
    this.config = config;
  }

  /**
     * Get the normalized configuration with defaults applied
     */
  getNormalized(): NormalizedConfig {
    if (!this.normalized) {
      this.normalized = {
        updateIntervalMs: this.getUpdateIntervalMs(),
        forceUpdateDelayMs: this.getForceUpdateDelayMs(),
        excludedFireIds: this.getExcludedFireIds(),
        features: this.getFeatures(),
        timerDurationMinutes: this.getTimerDurationMinutes(),
      };
    }
    return this.normalized;
  }

  /**
     * Get the account credentials, or null when either is missing
     */
  getCredentials(): { email: string; password: string } | null {
    const { email, password } = this.config;
    if (!email || !password) {
      return null;
    }
    return { email, password };
  }

  getUpdateIntervalMs(): number {
    const minutes = this.config.updateIntervalInMinutes || DEFAULT_UPDATE_INTERVAL_MINUTES;
    return ONE_MINUTE_MS * minutes;
  }

  getForceUpdateDelayMs(): number {
    return this.config.forceUpdateDelay ?? DEFAULT_FORCE_UPDATE_DELAY_MS;
  }

  getExcludedFireIds(): Set<string> {
    return new Set(this.config.excludedFiresByFireId || []);
  }

  isFireExcluded(fireId: string): boolean {
    return this.getExcludedFireIds().has(fireId);
  }

  /**
     * Get feature configuration; unset toggles follow the legacy master switch
     */
  getFeatures(): FeatureToggles {
    const legacy = this.config.showExtraFeatures === true;

    return {
      pulsatingEffect: this.config.showPulsatingEffect ?? legacy,
      mediaLight: this.config.showMediaLight ?? legacy,
      overheadLight: this.config.showOverheadLight ?? legacy,
      boostMode: this.config.showBoostMode ?? legacy,
      timer: this.config.showTimer ?? legacy,
    };
  }

  /**
     * Countdown the timer switch starts
     */
  getTimerDurationMinutes(): number {
    const minutes = this.config.timerDurationMinutes;
    if (minutes === undefined || !Number.isInteger(minutes) || minutes < 1 || minutes > MAX_TIMER_DURATION_MINUTES) {
      return DEFAULT_TIMER_DURATION_MINUTES;
    }
    return minutes;
  }

  /**
     * Validate configuration using Zod schemas
     */
  validateWithZod(): { valid: boolean; errors: string[] } {
    const result = safeValidateData(PluginConfigSchema, this.config);
    if (!result.success) {
      return {
        valid: false,
        errors: [result.error],
      };
    }

    return { valid: true, errors: [] };
  }

  /**
     * Validate configuration
     */
  validate(): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!this.config.email) {
      errors.push('Email is required');
    }
    if (!this.config.password) {
      errors.push('Password is required');
    }

    if (this.config.updateIntervalInMinutes !== undefined) {
      const interval = this.config.updateIntervalInMinutes;
      if (interval < 1 || interval > 60) {
        errors.push(`Update interval must be between 1 and 60 minutes, got: ${interval}`);
      } else if (interval < 2) {
        warnings.push(`Update interval ${interval}min polls every fire each minute and may hit the cloud rate limit. Recommended: 2+ minutes.`);
      }
    }

    if (this.config.forceUpdateDelay !== undefined) {
      const delaySeconds = Math.floor(this.config.forceUpdateDelay / ONE_SECOND_MS);
      if (delaySeconds < 1 || delaySeconds > 300) {
        errors.push(`Force update delay must be between 1 and 300 seconds, got: ${delaySeconds}`);
      }
    }

    if (this.config.timerDurationMinutes !== undefined) {
      const minutes = this.config.timerDurationMinutes;
      if (!Number.isInteger(minutes) || minutes < 1 || minutes > MAX_TIMER_DURATION_MINUTES) {
        errors.push(`Timer duration must be a whole number between 1 and ${MAX_TIMER_DURATION_MINUTES} minutes, got: ${minutes}`);
      }
    }

    const features = this.getFeatures();
    if (this.config.showExtraFeatures === true && Object.values(features).every(enabled => !enabled)) {
      warnings.push('showExtraFeatures is set but every individual feature is disabled');
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
     * Get raw config value
     */
  getRawConfig(): PluginConfig {
    return this.config;
  }
}
