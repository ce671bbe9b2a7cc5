/// <reference types="node" />
import { DispatchPolicy, type SimulationConfig, SimulationConfigSchema, parseDispatchPolicy } from '../models/types';

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const DEFAULT_CONFIG: SimulationConfig = {
  id: 'default',
  name: 'Default Configuration',

  // Reserve matched drivers so nobody is double-booked
  dispatchPolicy: DispatchPolicy.RESERVE,

  // Quiet by default; the CLI and dev server turn these on
  logEvents: false,
  recordTrace: false,

  maxEvents: 1_000_000,

  isDefault: true,
  createdAt: new Date(),
  updatedAt: new Date()
};

// =============================================================================
// CONFIGURATION MANAGER
// =============================================================================

export class ConfigManager {
  private configs: Map<string, SimulationConfig> = new Map();
  private defaultConfigId: string = 'default';

  constructor(initialDefault: SimulationConfig = DEFAULT_CONFIG) {
    this.configs.set(initialDefault.id, initialDefault);
    this.defaultConfigId = initialDefault.id;
  }

  /**
   * Get a configuration by ID, or return default if not found
   */
  getConfig(configId?: string): SimulationConfig {
    if (!configId) {
      return this.getDefaultConfig();
    }
    return this.configs.get(configId) || this.getDefaultConfig();
  }

  hasConfig(configId: string): boolean {
    return this.configs.has(configId);
  }

  getDefaultConfig(): SimulationConfig {
    return this.configs.get(this.defaultConfigId) || DEFAULT_CONFIG;
  }

  /**
   * Create or update a configuration.
   *
   * @throws ZodError if the configuration is malformed
   */
  saveConfig(config: SimulationConfig): SimulationConfig {
    SimulationConfigSchema.parse(config);

    const now = new Date();
    const existingConfig = this.configs.get(config.id);

    const updatedConfig: SimulationConfig = {
      ...config,
      createdAt: existingConfig?.createdAt || now,
      updatedAt: now
    };

    // If this is being set as default, unset others
    if (updatedConfig.isDefault) {
      this.configs.forEach((c, id) => {
        if (id !== config.id && c.isDefault) {
          this.configs.set(id, { ...c, isDefault: false });
        }
      });
      this.defaultConfigId = config.id;
    } else if (config.id === this.defaultConfigId) {
      throw new Error('Cannot unset the default configuration. Set another as default first.');
    }

    this.configs.set(config.id, updatedConfig);
    return updatedConfig;
  }

  /**
   * Delete a configuration (cannot delete the last remaining or default)
   */
  deleteConfig(configId: string): boolean {
    if (this.configs.size <= 1) {
      throw new Error('Cannot delete the only configuration');
    }
    if (configId === this.defaultConfigId) {
      throw new Error('Cannot delete the default configuration. Set another as default first.');
    }
    return this.configs.delete(configId);
  }

  listConfigs(): SimulationConfig[] {
    return Array.from(this.configs.values());
  }

  /**
   * Apply one-time overrides to a config (doesn't persist)
   */
  applyOverrides(
    baseConfig: SimulationConfig,
    overrides: Partial<SimulationConfig>
  ): SimulationConfig {
    return {
      ...baseConfig,
      ...overrides,
      id: baseConfig.id
    };
  }

  /**
   * Switch the dispatch policy of a saved configuration
   */
  updateDispatchPolicy(configId: string, policy: DispatchPolicy): SimulationConfig {
    return this.saveConfig({
      ...this.getConfig(configId),
      dispatchPolicy: policy
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
  /** Policy for the default configuration, from DISPATCH_POLICY */
  dispatchPolicy: DispatchPolicy;
  /** Log every applied event, from LOG_EVENTS */
  logEvents: boolean;
}

const NODE_ENVS: readonly EnvironmentConfig['nodeEnv'][] = ['development', 'production', 'test'];

export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const nodeEnv = NODE_ENVS.find(name => name === env.NODE_ENV) || 'development';
  const dispatchPolicy = parseDispatchPolicy(env.DISPATCH_POLICY);

  if (env.DISPATCH_POLICY && !dispatchPolicy) {
    throw new Error(
      `DISPATCH_POLICY must be one of ${Object.values(DispatchPolicy).join(', ')}, got "${env.DISPATCH_POLICY}"`
    );
  }

  return {
    port: parseInt(env.PORT || '3001', 10),
    nodeEnv,
    allowedOrigins: (env.ALLOWED_ORIGINS || 'http://localhost:5173').split(','),
    dispatchPolicy: dispatchPolicy || DEFAULT_CONFIG.dispatchPolicy,
    logEvents: env.LOG_EVENTS === 'true'
  };
}
