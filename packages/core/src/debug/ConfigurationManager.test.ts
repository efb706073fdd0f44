/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationManager } from './ConfigurationManager.js';

describe('ConfigurationManager', () => {
  beforeEach(() => {
    vi.stubEnv('DEBUG', '');
    vi.stubEnv('PARLEY_DEBUG', '');
    vi.stubEnv('DEBUG_ENABLED', '');
    vi.stubEnv('DEBUG_LEVEL', '');
    vi.stubEnv('DEBUG_OUTPUT', '');
    ConfigurationManager.resetInstance();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    ConfigurationManager.resetInstance();
  });

  it('returns the same instance until reset', () => {
    const first = ConfigurationManager.getInstance();
    expect(ConfigurationManager.getInstance()).toBe(first);

    ConfigurationManager.resetInstance();

    expect(ConfigurationManager.getInstance()).not.toBe(first);
  });

  it('is disabled with file output by default', () => {
    const config = ConfigurationManager.getInstance().getEffectiveConfig();

    expect(config.enabled).toBe(false);
    expect(ConfigurationManager.getInstance().getOutputTarget()).toBe('file');
  });

  it('enables parley namespaces named in DEBUG and ignores the rest', () => {
    vi.stubEnv('DEBUG', 'express:*, parley:chat');

    const config = ConfigurationManager.getInstance().getEffectiveConfig();

    expect(config.enabled).toBe(true);
    expect(config.namespaces).toEqual(['parley:chat']);
  });

  it('leaves DEBUG alone when it names no parley namespace', () => {
    vi.stubEnv('DEBUG', 'express:*');

    expect(ConfigurationManager.getInstance().getEffectiveConfig().enabled).toBe(
      false,
    );
  });

  it('reads namespaces, level and output from PARLEY_DEBUG variables', () => {
    vi.stubEnv('PARLEY_DEBUG', 'parley:*');
    vi.stubEnv('DEBUG_LEVEL', 'warn');
    vi.stubEnv('DEBUG_OUTPUT', 'stderr');

    const manager = ConfigurationManager.getInstance();

    expect(manager.getEffectiveConfig().namespaces).toEqual(['parley:*']);
    expect(manager.getEffectiveConfig().level).toBe('warn');
    expect(manager.getOutputTarget()).toBe('stderr');
  });

  it('lets ephemeral settings override command line settings', () => {
    const manager = ConfigurationManager.getInstance();
    manager.setCliConfig({ enabled: true, level: 'debug' });
    manager.setEphemeralConfig({ level: 'error' });

    expect(manager.getEffectiveConfig()).toMatchObject({
      enabled: true,
      level: 'error',
    });
  });

  it('notifies subscribers on every change until unsubscribed', () => {
    const manager = ConfigurationManager.getInstance();
    const listener = vi.fn();
    manager.subscribe(listener);

    manager.setEphemeralConfig({ enabled: true });
    manager.unsubscribe(listener);
    manager.setEphemeralConfig({ enabled: false });

    expect(listener).toHaveBeenCalledTimes(1);
  });
});
