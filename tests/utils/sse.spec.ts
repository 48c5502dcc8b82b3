import { describe, expect, it } from 'vitest';
import { readSseEvents } from '../../src/utils/sse.js';
import { collect, sseResponse } from '../harness/http.js';

function bodyOf(pieces: string[]): ReadableStream<Uint8Array> {
  const body = sseResponse(pieces).body;
  if (!body) throw new Error('response has no body');
  return body;
}

describe('readSseEvents', () => {
  it('reassembles events split across reads', async () => {
    const events = await collect(readSseEvents(bodyOf([
      'event: ping\nda',
      'ta: {"n":1}\n',
      '\ndata: second\n\n',
    ])));
    expect(events).toEqual([
      { event: 'ping', data: '{"n":1}' },
      { event: null, data: 'second' },
    ]);
  });

  it('joins multi-line data, skips comments and normalizes CRLF', async () => {
    const events = await collect(readSseEvents(bodyOf([': keep-alive\r\n\r\ndata: one\r\ndata: two\r\n\r\n'])));
    expect(events).toEqual([{ event: null, data: 'one\ntwo' }]);
  });

  it('keeps CRLF pairs that straddle two reads', async () => {
    const events = await collect(readSseEvents(bodyOf(['data: one\r\n\r', '\ndata: two\r', '\n\r\n'])));
    expect(events).toEqual([
      { event: null, data: 'one' },
      { event: null, data: 'two' },
    ]);
  });

  it('delivers a trailing event without a blank line', async () => {
    const events = await collect(readSseEvents(bodyOf(['data: [DONE]'])));
    expect(events).toEqual([{ event: null, data: '[DONE]' }]);
  });
});
