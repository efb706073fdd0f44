/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { FakeModelService, textReply } from './fakeModelService.js';
export type { FakeReply } from './fakeModelService.js';
export { RecordingPresenter } from './recordingPresenter.js';
export type { PresenterEvent } from './recordingPresenter.js';
