/// <reference types="node" />
import { z } from 'zod';
import { MatchingConfig, MatchingConfigSchema, ConfigUpdateSchema } from '../models/types';
import { ConfigError } from '../utils/errors';

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const DEFAULT_CONFIG: MatchingConfig = {
  id: 'default',
  name: 'Default Configuration',

  // Strictly greater than this to appear in results
  minimumScore: 20,

  defaultLimit: 10,
  maxLimit: 50,

  points: {
    location: {
      overlappingCrags: 30,         // Same destination, at least one shared crag
      flexible: 25,                 // Same destination, one side has no crag preference
      differentCrags: 20            // Same destination, disjoint crag choices
    },
    dateOverlap: {
      perDay: 4,
      max: 20                       // Five shared days saturate the score
    },
    discipline: {
      sharedProfile: 20,            // Both trips want it AND both climbers have a profile for it
      tripPreferenceOnly: 5
    },
    grade: {
      max: 15
    },
    riskTolerance: {
      same: 10,
      adjacent: 3,
      opposite: -10                 // Conservative paired with aggressive
    },
    availability: {
      max: 5                        // One point per shared non-rest block
    }
  },

  isDefault: true,
  createdAt: new Date(),
  updatedAt: new Date()
};

export type ThresholdKey = 'minimumScore' | 'defaultLimit' | 'maxLimit';

export type ConfigUpdate = z.infer<typeof ConfigUpdateSchema>;

// =============================================================================
// CONFIGURATION MANAGER
// =============================================================================

export class ConfigManager {
  private configs: Map<string, MatchingConfig> = new Map();
  private defaultConfigId: string = 'default';

  constructor(initial: MatchingConfig = DEFAULT_CONFIG) {
    this.configs.set(initial.id, initial);
    this.defaultConfigId = initial.id;
  }

  /**
   * Get a configuration by ID, or return default if not found
   */
  getConfig(configId?: string): MatchingConfig {
    if (!configId) {
      return this.getDefaultConfig();
    }
    return this.configs.get(configId) ?? this.getDefaultConfig();
  }

  hasConfig(configId: string): boolean {
    return this.configs.has(configId);
  }

  getDefaultConfig(): MatchingConfig {
    return this.configs.get(this.defaultConfigId) ?? DEFAULT_CONFIG;
  }

  /**
   * Create or update a configuration
   */
  saveConfig(config: MatchingConfig): MatchingConfig {
    const parsed = MatchingConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigError('Invalid matching configuration', parsed.error.flatten());
    }

    if (config.defaultLimit > config.maxLimit) {
      throw new ConfigError(
        `defaultLimit (${config.defaultLimit}) cannot exceed maxLimit (${config.maxLimit})`
      );
    }

    if (config.id === this.defaultConfigId && !config.isDefault) {
      throw new ConfigError('Cannot unset the default configuration. Set another as default first.');
    }

    const now = new Date();
    const existingConfig = this.configs.get(config.id);

    const updatedConfig: MatchingConfig = {
      ...config,
      createdAt: existingConfig?.createdAt ?? now,
      updatedAt: now
    };

    // Only one default at a time
    if (updatedConfig.isDefault) {
      this.configs.forEach((c, id) => {
        if (id !== config.id && c.isDefault) {
          this.configs.set(id, { ...c, isDefault: false });
        }
      });
      this.defaultConfigId = config.id;
    }

    this.configs.set(config.id, updatedConfig);
    return updatedConfig;
  }

  /**
   * Delete a configuration (cannot delete the last remaining or default)
   */
  deleteConfig(configId: string): boolean {
    if (this.configs.size <= 1) {
      throw new ConfigError('Cannot delete the only configuration');
    }
    if (configId === this.defaultConfigId) {
      throw new ConfigError('Cannot delete the default configuration. Set another as default first.');
    }
    return this.configs.delete(configId);
  }

  listConfigs(): MatchingConfig[] {
    return Array.from(this.configs.values());
  }

  /**
   * Apply one-time overrides to a config (doesn't persist)
   */
  applyOverrides(baseConfig: MatchingConfig, overrides: ConfigUpdate): MatchingConfig {
    const points = overrides.points;
    return {
      ...baseConfig,
      name: overrides.name ?? baseConfig.name,
      minimumScore: overrides.minimumScore ?? baseConfig.minimumScore,
      defaultLimit: overrides.defaultLimit ?? baseConfig.defaultLimit,
      maxLimit: overrides.maxLimit ?? baseConfig.maxLimit,
      isDefault: overrides.isDefault ?? baseConfig.isDefault,
      // Deep merge, one scorer at a time
      points: {
        location: { ...baseConfig.points.location, ...points?.location },
        dateOverlap: { ...baseConfig.points.dateOverlap, ...points?.dateOverlap },
        discipline: { ...baseConfig.points.discipline, ...points?.discipline },
        grade: { ...baseConfig.points.grade, ...points?.grade },
        riskTolerance: { ...baseConfig.points.riskTolerance, ...points?.riskTolerance },
        availability: { ...baseConfig.points.availability, ...points?.availability }
      }
    };
  }

  /**
   * Validate an untrusted update body and save it on top of the stored config.
   */
  updateConfig(configId: string, body: unknown): MatchingConfig {
    const parsed = ConfigUpdateSchema.safeParse(body);
    if (!parsed.success) {
      throw new ConfigError('Invalid configuration update', parsed.error.flatten());
    }

    const base = this.configs.get(configId) ?? { ...this.getDefaultConfig(), id: configId, isDefault: false };
    return this.saveConfig({
      ...this.applyOverrides(base, parsed.data),
      id: configId
    });
  }

  /**
   * Update a specific threshold
   */
  updateThreshold(configId: string, threshold: ThresholdKey, value: number): MatchingConfig {
    const config = this.getConfig(configId);

    if (threshold !== 'minimumScore' && value <= 0) {
      throw new ConfigError(`${threshold} must be a positive integer`);
    }

    return this.saveConfig({
      ...config,
      [threshold]: value
    });
  }
}

// Singleton instance
export const configManager = new ConfigManager();

// =============================================================================
// ENVIRONMENT CONFIGURATION
// =============================================================================

export interface EnvironmentConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  allowedOrigins: string[];

  /** JSON file the development store is seeded from (relative to cwd) */
  seedDataPath: string;

  /** Which saved matching configuration the engine starts with */
  matchConfigId: string;
}

const NODE_ENVS: EnvironmentConfig['nodeEnv'][] = ['development', 'production', 'test'];

function parseNodeEnv(value: string | undefined): EnvironmentConfig['nodeEnv'] {
  return NODE_ENVS.find(env => env === value) ?? 'development';
}

export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  return {
    port: parseInt(env.PORT || '3001', 10),
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    allowedOrigins: (env.ALLOWED_ORIGINS || 'http://localhost:5173').split(','),
    seedDataPath: env.SEED_DATA_PATH || 'data/seed.json',
    matchConfigId: env.MATCH_CONFIG_ID || 'default'
  };
}
