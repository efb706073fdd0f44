/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import type { ChatSettingKey } from '@parley/core';
import { getCliVersion } from '../utils/version.js';

export interface CliArgs {
  model: string | undefined;
  baseUrl: string | undefined;
  historyFile: string | undefined;
  systemPrompt: string | undefined;
  stream: boolean | undefined;
  debug: boolean;
  check: boolean;
}

export async function parseArguments(
  argv: string[] = hideBin(process.argv),
): Promise<CliArgs> {
  const yargsInstance = yargs(argv)
    .locale('en')
    .scriptName('parley')
    .usage('$0 [options]', 'Parley - chat with an LLM from the terminal')
    .option('model', {
      alias: 'm',
      type: 'string',
      description: 'Model to request',
    })
    .option('base-url', {
      type: 'string',
      description: 'Base URL of the chat completion API',
    })
    .option('history-file', {
      type: 'string',
      description: 'File the sessions are saved to',
    })
    .option('system-prompt', {
      type: 'string',
      description: 'System prompt sent with every request',
    })
    .option('stream', {
      type: 'boolean',
      description: 'Stream replies as they arrive (--no-stream to disable)',
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      description: 'Write debug logs for all parley namespaces',
      default: false,
    })
    .option('check', {
      type: 'boolean',
      description: 'Test the connection to the model service and exit',
      default: false,
    })
    .version(await getCliVersion())
    .alias('v', 'version')
    .help()
    .alias('h', 'help')
    .strict();

  yargsInstance.wrap(yargsInstance.terminalWidth());
  const result = await yargsInstance.parseAsync();

  return {
    model: result.model,
    baseUrl: result.baseUrl,
    historyFile: result.historyFile,
    systemPrompt: result.systemPrompt,
    stream: result.stream,
    debug: result.debug,
    check: result.check,
  };
}

/**
 * Settings given on the command line. Absent flags stay `undefined`, which
 * `loadChatConfig` skips.
 */
export function toConfigOverrides(
  args: CliArgs,
): Partial<Record<ChatSettingKey, unknown>> {
  return {
    model: args.model,
    baseURL: args.baseUrl,
    historyFile: args.historyFile,
    systemPrompt: args.systemPrompt,
    streamingEnabled: args.stream,
  };
}
