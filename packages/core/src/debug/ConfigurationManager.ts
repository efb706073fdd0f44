/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { PARLEY_DIR } from '../utils/paths.js';
import type { DebugSettings } from './types.js';

const userSettingsSchema = z.object({
  debug: z
    .object({
      enabled: z.boolean(),
      namespaces: z.array(z.string()),
      level: z.string(),
      output: z.union([
        z.string(),
        z.object({ target: z.string(), directory: z.string().optional() }),
      ]),
      redactPatterns: z.array(z.string()),
    })
    .partial()
    .optional(),
});

interface ConfigurationSources {
  env: NodeJS.ProcessEnv;
  homeDir: string;
}

/**
 * Resolves the effective debug logging settings. Sources, lowest priority
 * first: defaults, `~/.parley/settings.json` (`debug` key), environment,
 * command line, runtime (ephemeral) overrides.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings;
  private userConfig: Partial<DebugSettings> | null = null;
  private envConfig: Partial<DebugSettings> | null = null;
  private cliConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager({
        env: process.env,
        homeDir: os.homedir(),
      });
    }
    return ConfigurationManager.instance;
  }

  /**
   * Drops the shared instance so the next getInstance() re-reads the
   * environment. Test use only.
   */
  static resetInstance(): void {
    ConfigurationManager.instance = undefined;
  }

  private constructor(private readonly sources: ConfigurationSources) {
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'debug',
      output: { target: 'file', directory: `~/${PARLEY_DIR}/debug` },
      redactPatterns: ['apiKey', 'api_key', 'token', 'password'],
    };
    this.loadEnvironmentConfig();
    this.loadUserConfig();
    this.mergedConfig = this.merge();
  }

  private loadEnvironmentConfig(): void {
    const { env } = this.sources;

    if (env.DEBUG) {
      // Only take over DEBUG when it names our namespaces
      const namespaces = this.parseDebugEnv(env.DEBUG).filter(
        (ns) => ns.startsWith('parley') || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    if (env.PARLEY_DEBUG) {
      this.envConfig = {
        enabled: true,
        namespaces: this.parseDebugEnv(env.PARLEY_DEBUG),
      };
    }

    if (env.DEBUG_ENABLED) {
      this.envConfig = {
        ...this.envConfig,
        enabled: env.DEBUG_ENABLED === 'true',
      };
    }

    if (env.DEBUG_LEVEL) {
      this.envConfig = { ...this.envConfig, level: env.DEBUG_LEVEL };
    }

    if (env.DEBUG_OUTPUT) {
      this.envConfig = {
        ...this.envConfig,
        output: { target: env.DEBUG_OUTPUT },
      };
    }
  }

  private loadUserConfig(): void {
    if (!this.sources.homeDir) {
      return;
    }
    const configPath = path.join(
      this.sources.homeDir,
      PARLEY_DIR,
      'settings.json',
    );
    if (!fs.existsSync(configPath)) {
      return;
    }
    try {
      const parsed = userSettingsSchema.safeParse(
        JSON.parse(fs.readFileSync(configPath, 'utf8')),
      );
      if (parsed.success && parsed.data.debug) {
        this.userConfig = parsed.data.debug;
      }
    } catch (error) {
      console.warn('Failed to load user debug settings:', error);
    }
  }

  private merge(): DebugSettings {
    let merged: DebugSettings = { ...this.defaultConfig };
    for (const config of [
      this.userConfig,
      this.envConfig,
      this.cliConfig,
      this.ephemeralConfig,
    ]) {
      if (config) {
        merged = { ...merged, ...config };
      }
    }
    return merged;
  }

  private mergeConfigurations(): void {
    this.mergedConfig = this.merge();
    this.listeners.forEach((listener) => listener());
  }

  setCliConfig(config: Partial<DebugSettings>): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getOutputTarget(): string {
    const output = this.mergedConfig.output;
    if (typeof output === 'string') {
      return output;
    }
    return output.target;
  }

  getOutputDirectory(): string | undefined {
    const output = this.mergedConfig.output;
    return typeof output === 'string' ? undefined : output.directory;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
