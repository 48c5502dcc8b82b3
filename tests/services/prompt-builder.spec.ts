import { describe, expect, it } from 'vitest';
import { formatRetrievedChunks, formatSummaryBlock, PromptBuilder } from '../../src/services/prompt-builder.js';

describe('formatRetrievedChunks', () => {
  it('numbers sources and prints relevance with two decimals', () => {
    const text = formatRetrievedChunks([
      { content: 'Tomatoes need full sun.', source: 'garden.md', score: 0.876, section: 'Light' },
      { content: 'Water deeply.', source: 'care.md', score: 0.5 },
    ]);
    expect(text).toBe([
      'RELEVANT CONTEXT FROM ATTACHED DOCUMENTS:',
      '(Use this information to inform your response. Cite sources when directly referencing content.)',
      '',
      '[Source 1: garden.md',
      ' Section: Light',
      ' Relevance: 0.88]',
      'Tomatoes need full sun.',
      '',
      '[Source 2: care.md',
      ' Relevance: 0.50]',
      'Water deeply.',
      '',
    ].join('\n'));
  });
});

describe('PromptBuilder', () => {
  it('falls back to the default system prompt', () => {
    expect(new PromptBuilder('   ').getSystemPrompt()).toBe('You are a helpful assistant.');
  });

  it('stores the latest summary only', () => {
    const builder = new PromptBuilder();
    builder.setSummary('<ContextSummary>one</ContextSummary>');
    builder.setSummary('<ContextSummary>two</ContextSummary>');
    expect(builder.getSummary()).toBe('<ContextSummary>two</ContextSummary>');
    builder.setSummary('');
    expect(builder.getSummary()).toBeNull();
  });

  it('orders context notes ahead of the active history', () => {
    const builder = new PromptBuilder();
    builder.history.addUser('old question');
    builder.history.addAssistant('old answer');
    builder.history.addUser('new question');
    builder.history.markSummarized(2);

    builder.setSummary('<ContextSummary/>');
    builder.setMemory('Prefers metric units.');
    builder.setScratchpad('Beds: 4x8');
    builder.setRagContext([{ content: 'chunk', source: 'doc.md', score: 1 }]);
    builder.setIntentHint('[hint]');

    const contents = builder.buildMessages().map((message) => message.content);
    expect(contents).toEqual([
      formatSummaryBlock('<ContextSummary/>'),
      'PERSISTENT MEMORY:\nPrefers metric units.',
      'SCRATCHPAD:\nBeds: 4x8',
      formatRetrievedChunks([{ content: 'chunk', source: 'doc.md', score: 1 }]),
      '[hint]',
      'new question',
    ]);
    expect(builder.buildMessages().every((message) => message.role === 'user')).toBe(true);
  });

  it('places merged side notes after the scratchpad and before retrieval', () => {
    const builder = new PromptBuilder();
    builder.history.addUser('next');
    builder.setScratchpad('pad');
    builder.addSideNote('[Side Discussion Summary]\nQ: a\nA: b');
    builder.addSideNote('   ');
    builder.addSideNote('[Side Discussion Summary]\nQ: c\nA: d');
    builder.setIntentHint('[hint]');

    expect(builder.buildMessages().map((message) => message.content)).toEqual([
      'SCRATCHPAD:\npad',
      '[Side Discussion Summary]\nQ: a\nA: b',
      '[Side Discussion Summary]\nQ: c\nA: d',
      '[hint]',
      'next',
    ]);

    builder.reset();
    expect(builder.getSideNotes()).toEqual([]);
  });

  it('omits blocks that are not set', () => {
    const builder = new PromptBuilder();
    builder.history.addUser('hello');
    builder.setRagContext([]);
    builder.setIntentHint('  ');
    expect(builder.buildMessages()).toEqual([{ role: 'user', content: 'hello' }]);
  });

  it('keeps memory and scratchpad across a reset', () => {
    const builder = new PromptBuilder('Be brief.');
    builder.history.addUser('hello');
    builder.setSummary('<ContextSummary/>');
    builder.setMemory('remember me');
    builder.setScratchpad('pad');
    builder.setIntentHint('[hint]');
    builder.reset();

    expect(builder.history.length).toBe(0);
    expect(builder.getSummary()).toBeNull();
    expect(builder.getSystemPrompt()).toBe('Be brief.');
    expect(builder.buildMessages().map((message) => message.content)).toEqual([
      'PERSISTENT MEMORY:\nremember me',
      'SCRATCHPAD:\npad',
    ]);
  });
});
