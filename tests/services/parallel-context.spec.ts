import { describe, expect, it } from 'vitest';
import {
  buildSideSystemPrompt,
  ParallelContextManager,
  SIDE_SYSTEM_PROMPT,
  SideConversation,
} from '../../src/services/parallel-context.js';

describe('SideConversation', () => {
  it('digests the thread as Q and A lines, cutting long replies', () => {
    const side = new SideConversation();
    side.addMessage('user', 'Is cedar safe for vegetables?');
    side.addMessage('assistant', 'y'.repeat(205));

    expect(side.toSummary()).toBe(
      `[Side Discussion Summary]\nQ: Is cedar safe for vegetables?\nA: ${'y'.repeat(200)}...`,
    );
    expect(new SideConversation().toSummary()).toBe('');
  });

  it('withdraws only a trailing user message', () => {
    const side = new SideConversation();
    side.addMessage('user', 'first');
    side.addMessage('assistant', 'reply');
    expect(side.removeLastUser()).toBe(false);

    side.addMessage('user', 'second');
    expect(side.getLastUserMessage()).toBe('second');
    expect(side.removeLastUser()).toBe(true);
    expect(side.buildMessages()).toEqual([
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'reply' },
    ]);
  });
});

describe('ParallelContextManager', () => {
  it('refuses messages when no side conversation is open', () => {
    const manager = new ParallelContextManager();
    expect(manager.addUserMessage('hello')).toBe(false);
    expect(manager.end(true)).toBeNull();
  });

  it('returns a digest only when merging a non-empty thread', () => {
    const manager = new ParallelContextManager();
    manager.start();
    manager.addUserMessage('Quick check: frost date?');
    manager.addAssistantMessage('Mid April.');

    expect(manager.end(true)).toBe('[Side Discussion Summary]\nQ: Quick check: frost date?\nA: Mid April.');
    expect(manager.active).toBeNull();
    expect(manager.getHistory().map((side) => side.merged)).toEqual([true]);

    manager.start();
    expect(manager.end(true)).toBeNull();
    expect(manager.getHistory()).toHaveLength(2);
  });

  it('archives an open thread when a new one starts', () => {
    const manager = new ParallelContextManager();
    const first = manager.start();
    const second = manager.start();

    expect(second).not.toBe(first);
    expect(manager.getHistory()).toEqual([first]);
    manager.clear();
    expect(manager.getHistory()).toEqual([]);
  });
});

describe('buildSideSystemPrompt', () => {
  it('appends the main summary when there is one', () => {
    expect(buildSideSystemPrompt(null)).toBe(SIDE_SYSTEM_PROMPT);
    expect(buildSideSystemPrompt('<ContextSummary/>')).toBe(
      `${SIDE_SYSTEM_PROMPT}\n\nMain conversation context:\n<ContextSummary/>`,
    );
  });
});
