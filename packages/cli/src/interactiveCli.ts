/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ConversationOrchestrator,
  DebugLogger,
  type ChatSessionManager,
  type ChatSettings,
  type ModelService,
} from '@parley/core';
import type { CommandContext, SlashCommand } from './ui/commands/types.js';
import { buildHelpEntries } from './ui/commands/helpCommand.js';
import { loadInputFile } from './ui/fileInput.js';
import type { LineInput, LineResult } from './ui/lineInput.js';
import { SlashCommandProcessor } from './ui/slashCommandProcessor.js';
import type { TerminalPresenter } from './ui/TerminalPresenter.js';
import { MessageType } from './ui/types.js';

const logger = new DebugLogger('parley:cli:interactive');

export interface InteractiveChatOptions {
  sessions: ChatSessionManager;
  settings: ChatSettings;
  modelService: ModelService;
  presenter: TerminalPresenter;
  lineInput: LineInput;
  commands: readonly SlashCommand[];
  /** Directory `@path` input is resolved against. */
  cwd?: string;
  userPrompt?: string;
}

function answerOf(result: LineResult): string | null {
  return result.type === 'line' ? result.text : null;
}

/**
 * The read-eval loop: slash commands, `@file` input and chat turns until
 * `/exit` or the end of input, then a final save.
 */
export async function runInteractiveChat(
  options: InteractiveChatOptions,
): Promise<void> {
  const { sessions, settings, modelService, presenter, lineInput, commands } =
    options;
  const userPrompt = options.userPrompt ?? 'You: ';

  const ui: CommandContext['ui'] = {
    addItem: (item) => presenter.addItem(item),
    prompt: async (question, promptOptions) =>
      answerOf(
        promptOptions?.secret
          ? await lineInput.readSecret(question)
          : await lineInput.read(question),
      ),
  };
  const processor = new SlashCommandProcessor(commands, {
    services: { sessions, settings, modelService },
    ui,
  });
  const orchestrator = new ConversationOrchestrator(
    sessions,
    modelService,
    settings,
    presenter,
  );

  let activeRequest: AbortController | undefined;
  lineInput.onInterrupt(() => activeRequest?.abort());

  presenter.showWelcome(buildHelpEntries(commands));

  for (;;) {
    const result = await lineInput.read(userPrompt);
    if (result.type === 'closed') {
      presenter.blankLine();
      break;
    }
    if (result.type === 'interrupted') {
      presenter.blankLine();
      presenter.addItem({
        type: MessageType.WARNING,
        text: 'Interrupted. Type /exit to quit.',
      });
      continue;
    }

    let text = result.text.trim();
    if (!text) {
      continue;
    }
    if (text.startsWith('@')) {
      const loaded = await loadInputFile(text.slice(1), {
        settings,
        ui,
        cwd: options.cwd,
      });
      if (loaded === null) {
        continue;
      }
      text = loaded;
    }

    if (text.startsWith('/')) {
      const outcome = await processor.handleSlashCommand(text);
      if (outcome.type === 'quit') {
        break;
      }
      if (outcome.type === 'unknown') {
        presenter.showError(outcome.error);
      }
      continue;
    }

    activeRequest = new AbortController();
    try {
      const outcome = await orchestrator.sendMessage(text, {
        signal: activeRequest.signal,
      });
      logger.debug(() => `Turn finished: ${outcome.status}`);
      if (outcome.status === 'cancelled') {
        presenter.addItem({
          type: MessageType.WARNING,
          text: 'Request cancelled.',
        });
      }
    } finally {
      activeRequest = undefined;
    }
  }

  await shutdown(sessions, presenter);
  lineInput.close();
}

/**
 * Final save. A failure is shown by the session store's error reporter, so
 * only success is reported here.
 */
async function shutdown(
  sessions: ChatSessionManager,
  presenter: TerminalPresenter,
): Promise<void> {
  const saved = await sessions.saveHistory();
  if (saved.ok) {
    presenter.addItem({
      type: MessageType.SUCCESS,
      text: 'Chat history saved.',
    });
  }
  presenter.addItem({ type: MessageType.INFO, text: 'Goodbye!' });
}
