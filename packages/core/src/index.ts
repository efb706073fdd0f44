/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Chat core
export * from './chat/types.js';
export * from './chat/errors.js';
export * from './chat/contextWindow.js';
export * from './chat/SessionStore.js';
export * from './chat/ChatSessionManager.js';
export * from './chat/presenter.js';
export * from './chat/StreamingResponseAggregator.js';
export * from './chat/ConversationOrchestrator.js';

// Storage
export * from './storage/SessionDocumentStorage.js';

// Config
export * from './config/chatSettings.js';

// Providers
export * from './providers/ModelService.js';
export * from './providers/openai/OpenAIChatService.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/paths.js';
export * from './utils/result.js';

// Debug logging
export * from './debug/index.js';
