import { describe, it, expect, beforeEach } from 'vitest';
import { Writable } from 'node:stream';
import { TerminalPicker, renderSegments, type PickerSession } from '../../../src/cli/picker.js';
import { highlightMatches } from '../../../src/session/highlight.js';
import type { SessionEvent, SessionEventListener } from '../../../src/types/session.types.js';

class StubSession implements PickerSession {
  readonly highlight = highlightMatches;
  private readonly listeners = new Set<SessionEventListener>();

  on(listener: SessionEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  fire(...events: SessionEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) listener(event);
    }
  }
}

class CollectingStream extends Writable {
  text = '';

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void): void {
    this.text += chunk.toString();
    callback();
  }
}

describe('renderSegments', () => {
  const segments = [
    { text: 'fo', match: true },
    { text: 'o', match: false },
  ];

  it('wraps matched segments in ANSI bold yellow when colored', () => {
    expect(renderSegments(segments, true)).toBe('\u001b[1;33mfo\u001b[0mo');
  });

  it('joins plain text when uncolored', () => {
    expect(renderSegments(segments, false)).toBe('foo');
  });
});

describe('TerminalPicker', () => {
  let session: StubSession;
  let output: CollectingStream;

  beforeEach(() => {
    session = new StubSession();
    output = new CollectingStream();
  });

  it('renders the first `limit` candidates and a count on refresh', () => {
    const picker = new TerminalPicker(session, { limit: 2, output, color: false });
    session.fire(
      { type: 'flush' },
      { type: 'append', candidates: ['foo', 'food', 'fog'] },
      { type: 'refresh', terms: ['fo'] },
    );

    expect(output.text).toBe('  foo\n  food\n-- 2/3 --\n');
    expect(picker.visible).toEqual(['foo', 'food']);
  });

  it('highlights matches when colored', () => {
    new TerminalPicker(session, { limit: 5, output, color: true });
    session.fire({ type: 'flush' }, { type: 'append', candidates: ['afoo'] }, { type: 'refresh', terms: ['fo'] });

    expect(output.text).toBe('  a\u001b[1;33mfo\u001b[0mo\n-- 1/1 --\n');
  });

  it('flush discards the previous batch', () => {
    const picker = new TerminalPicker(session, { limit: 5, output, color: false });
    session.fire({ type: 'append', candidates: ['old'] }, { type: 'flush' }, { type: 'append', candidates: ['new'] });

    expect(picker.visible).toEqual(['new']);
  });

  it('renders an empty batch as a zero count', () => {
    new TerminalPicker(session, { limit: 5, output, color: false });
    session.fire({ type: 'flush' }, { type: 'append', candidates: [] }, { type: 'refresh', terms: ['zz'] });

    expect(output.text).toBe('-- 0/0 --\n');
  });

  it('stops listening after close()', () => {
    const picker = new TerminalPicker(session, { limit: 5, output, color: false });
    picker.close();
    session.fire({ type: 'append', candidates: ['x'] }, { type: 'refresh', terms: ['x'] });

    expect(picker.visible).toEqual([]);
    expect(output.text).toBe('');
  });
});
