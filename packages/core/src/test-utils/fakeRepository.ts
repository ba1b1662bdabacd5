/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { RepositoryProvider } from '../git/repository.js';

type Reply = string | Error;

export type RepositoryCall =
  | { method: 'status' | 'stagedNumstat' | 'unstagedNumstat' }
  | { method: 'add' | 'reset' | 'restore' | 'clean'; paths: string[] };

/**
 * In-memory RepositoryProvider returning canned reports. Assign an Error
 * to any field to make that call fail.
 */
export class FakeRepository implements RepositoryProvider {
  statusReply: Reply = '';
  stagedReply: Reply = '';
  unstagedReply: Reply = '';
  mutationError: Error | undefined;
  readonly calls: RepositoryCall[] = [];

  constructor(
    replies: { status?: Reply; staged?: Reply; unstaged?: Reply } = {},
  ) {
    this.statusReply = replies.status ?? '';
    this.stagedReply = replies.staged ?? '';
    this.unstagedReply = replies.unstaged ?? '';
  }

  async status(): Promise<string> {
    this.calls.push({ method: 'status' });
    return this.reply(this.statusReply);
  }

  async stagedNumstat(): Promise<string> {
    this.calls.push({ method: 'stagedNumstat' });
    return this.reply(this.stagedReply);
  }

  async unstagedNumstat(): Promise<string> {
    this.calls.push({ method: 'unstagedNumstat' });
    return this.reply(this.unstagedReply);
  }

  async add(paths: readonly string[]): Promise<void> {
    this.mutate('add', paths);
  }

  async reset(paths: readonly string[]): Promise<void> {
    this.mutate('reset', paths);
  }

  async restore(paths: readonly string[]): Promise<void> {
    this.mutate('restore', paths);
  }

  async clean(paths: readonly string[]): Promise<void> {
    this.mutate('clean', paths);
  }

  private reply(reply: Reply): string {
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  private mutate(
    method: 'add' | 'reset' | 'restore' | 'clean',
    paths: readonly string[],
  ): void {
    this.calls.push({ method, paths: [...paths] });
    if (this.mutationError) {
      throw this.mutationError;
    }
  }
}
