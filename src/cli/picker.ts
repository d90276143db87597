import type { Writable } from 'node:stream';
import type { HighlightSegment, SessionEvent } from '../types/session.types.js';
import type { QuerySession } from '../session/querySession.js';

const MATCH_START = '\u001b[1;33m';
const MATCH_END = '\u001b[0m';

export interface PickerOptions {
  limit: number;
  output: Writable;
  color: boolean;
}

export type PickerSession = Pick<QuerySession, 'on' | 'highlight'>;

export function renderSegments(segments: HighlightSegment[], color: boolean): string {
  return segments
    .map((segment) => (segment.match && color ? `${MATCH_START}${segment.text}${MATCH_END}` : segment.text))
    .join('');
}

/**
 * Minimal terminal consumer: keeps the latest candidate batch and prints the
 * first `limit` of them, highlighted, on every `refresh`.
 */
export class TerminalPicker {
  private candidates: string[] = [];
  private readonly detach: () => void;

  constructor(
    private readonly session: PickerSession,
    private readonly options: PickerOptions,
  ) {
    this.detach = session.on((event) => {
      this.handle(event);
    });
  }

  get visible(): readonly string[] {
    return this.candidates.slice(0, this.options.limit);
  }

  close(): void {
    this.detach();
  }

  private handle(event: SessionEvent): void {
    switch (event.type) {
      case 'flush':
        this.candidates = [];
        return;
      case 'append':
        this.candidates.push(...event.candidates);
        return;
      case 'refresh':
        this.render(event.terms);
        return;
      case 'begin':
      case 'destroyed':
        return;
      default: {
        const _exhaustive: never = event;
        return _exhaustive;
      }
    }
  }

  private render(terms: string[]): void {
    const shown = this.visible;
    let out = '';
    for (const candidate of shown) {
      out += `  ${renderSegments(this.session.highlight(candidate, terms), this.options.color)}\n`;
    }
    out += `-- ${shown.length}/${this.candidates.length} --\n`;
    this.options.output.write(out);
  }
}
