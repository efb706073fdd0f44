/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ChatSessionManager,
  ChatSettings,
  ConfigurationManager,
  DebugLogger,
  OpenAIChatService,
  SessionDocumentStorage,
  SessionStore,
  loadChatConfig,
  resolveHistoryPath,
} from '@parley/core';
import { parseArguments, toConfigOverrides } from './config/config.js';
import { loadEnvironment } from './config/environment.js';
import { runInteractiveChat } from './interactiveCli.js';
import { BuiltinCommandLoader } from './services/BuiltinCommandLoader.js';
import { LineInput } from './ui/lineInput.js';
import { TerminalPresenter } from './ui/TerminalPresenter.js';
import { MessageType } from './ui/types.js';

const logger = new DebugLogger('parley:cli');

export async function main(): Promise<void> {
  const envFile = loadEnvironment();
  const args = await parseArguments();

  if (args.debug) {
    ConfigurationManager.getInstance().setCliConfig({
      enabled: true,
      namespaces: ['parley:*'],
    });
  }
  logger.debug(() => `Environment file: ${envFile ?? 'none'}`);

  const settings = new ChatSettings(
    loadChatConfig(process.env, toConfigOverrides(args)),
  );
  const presenter = new TerminalPresenter();
  const modelService = new OpenAIChatService(settings);

  if (args.check) {
    const description = modelService.describe();
    presenter.addItem({
      type: MessageType.INFO,
      text: `Testing ${description.model} at ${description.baseURL}...`,
    });
    const connected = await modelService.validateConnection();
    presenter.addItem(
      connected
        ? { type: MessageType.SUCCESS, text: 'Connection OK.' }
        : { type: MessageType.ERROR, text: 'Connection failed.' },
    );
    process.exitCode = connected ? 0 : 1;
    return;
  }

  const store = await SessionStore.open(
    new SessionDocumentStorage(resolveHistoryPath(settings.get().historyFile)),
    { onPersistenceError: (error) => presenter.showError(error) },
  );
  const sessions = new ChatSessionManager(store, settings);

  const controller = new AbortController();
  const commands = await new BuiltinCommandLoader().loadCommands(
    controller.signal,
  );

  await runInteractiveChat({
    sessions,
    settings,
    modelService,
    presenter,
    lineInput: new LineInput(),
    commands,
  });
}
