import { z } from 'zod';
import type { Instruction, ResponseLine } from '../types/protocol.types.js';
import { ProtocolError } from '../errors/protocol.js';
import { quoteArg, unquoteArg } from './quoting.js';

const instructionSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('filter'), terms: z.array(z.string()) }),
  z.object({ op: z.literal('start'), command: z.string() }),
  z.object({ op: z.literal('shutdown') }),
]);

const EVAL_PREFIX = '-eval ';
const RESPONSE_LINE = /^(-print-nonl|-print)(?: ([\s\S]*))?$/;

// ── Requests ─────────────────────────────────────────────────────────────────

export function encodeRequest(instruction: Instruction): string {
  return `${EVAL_PREFIX}${quoteArg(JSON.stringify(instruction))}\n`;
}

/** Decode one request line (without its newline). Throws ProtocolError. */
export function decodeRequest(line: string): Instruction {
  if (!line.startsWith(EVAL_PREFIX)) {
    throw new ProtocolError(`Expected an -eval request, got: ${line.slice(0, 40)}`);
  }

  let value: unknown;
  try {
    value = JSON.parse(unquoteArg(line.slice(EVAL_PREFIX.length)));
  } catch (err: unknown) {
    throw new ProtocolError('Request expression is not valid JSON', err);
  }

  const parsed = instructionSchema.safeParse(value);
  if (!parsed.success) {
    throw new ProtocolError('Request expression is not a known instruction', parsed.error);
  }
  return parsed.data;
}

// ── Responses ────────────────────────────────────────────────────────────────

export function parseResponseLine(line: string): ResponseLine {
  const match = RESPONSE_LINE.exec(line);
  if (!match) return { kind: 'unknown', raw: line };
  const payload = unquoteArg(match[2] ?? '');
  return match[1] === '-print-nonl' ? { kind: 'print-nonl', payload } : { kind: 'print', payload };
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Split text into chunks of at most `size` code units without cutting a surrogate pair. */
export function chunkText(text: string, size: number): string[] {
  const limit = Math.max(2, size);
  const chunks: string[] = [];
  let offset = 0;
  while (offset < text.length) {
    let end = Math.min(offset + limit, text.length);
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) end -= 1;
    chunks.push(text.slice(offset, end));
    offset = end;
  }
  return chunks;
}

/**
 * Frame a payload as response lines: the first chunk as `-print`, every
 * following chunk as `-print-nonl`. Chunks are cut before quoting.
 */
export function encodeResponse(payload: string, chunkSize: number): string {
  const [first = '', ...rest] = chunkText(payload, chunkSize);
  let out = `-print ${quoteArg(first)}\n`;
  for (const chunk of rest) {
    out += `-print-nonl ${quoteArg(chunk)}\n`;
  }
  return out;
}

export function encodeGreeting(pid: number): string {
  return `-pid ${pid}\n`;
}

/** Apply one response line to the accumulated payload. */
export function accumulate(current: string | null, line: ResponseLine): string | null {
  switch (line.kind) {
    case 'print':
      return line.payload;
    case 'print-nonl':
      return (current ?? '') + line.payload;
    case 'unknown':
      return current;
    default: {
      const _exhaustive: never = line;
      return _exhaustive;
    }
  }
}
