/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  ChatMessage,
  SessionStats,
  SessionSummary,
} from '@parley/core';

export enum MessageType {
  INFO = 'info',
  SUCCESS = 'success',
  WARNING = 'warning',
  ERROR = 'error',
  HELP = 'help',
  HISTORY = 'history',
  STATS = 'stats',
  SESSION_LIST = 'session_list',
  CONFIG = 'config',
  PANEL = 'panel',
}

export interface HelpEntry {
  usage: string;
  description: string;
}

export interface ConfigEntry {
  name: string;
  value: string;
}

export type HistoryItemInfo = {
  type: MessageType.INFO;
  text: string;
};

export type HistoryItemSuccess = {
  type: MessageType.SUCCESS;
  text: string;
};

export type HistoryItemWarning = {
  type: MessageType.WARNING;
  text: string;
};

export type HistoryItemError = {
  type: MessageType.ERROR;
  text: string;
};

export type HistoryItemHelp = {
  type: MessageType.HELP;
  commands: HelpEntry[];
};

export type HistoryItemHistory = {
  type: MessageType.HISTORY;
  sessionName: string;
  messages: readonly ChatMessage[];
};

export type HistoryItemStats = {
  type: MessageType.STATS;
  stats: SessionStats;
};

export type HistoryItemSessionList = {
  type: MessageType.SESSION_LIST;
  sessions: SessionSummary[];
};

export type HistoryItemConfig = {
  type: MessageType.CONFIG;
  entries: ConfigEntry[];
};

export type HistoryItemPanel = {
  type: MessageType.PANEL;
  title: string;
  text: string;
};

/** Anything a command or the chat loop prints outside a model reply. */
export type HistoryItem =
  | HistoryItemInfo
  | HistoryItemSuccess
  | HistoryItemWarning
  | HistoryItemError
  | HistoryItemHelp
  | HistoryItemHistory
  | HistoryItemStats
  | HistoryItemSessionList
  | HistoryItemConfig
  | HistoryItemPanel;
