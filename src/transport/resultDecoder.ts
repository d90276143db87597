import { z } from 'zod';

const candidateListSchema = z.array(z.string());

/**
 * Decode a worker's accumulated payload into candidate strings.
 * Absent, empty or malformed payloads decode to an empty list.
 */
export function decodeCandidates(payload: string | null): string[] {
  if (payload === null || payload.trim() === '') return [];

  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch {
    return [];
  }

  const parsed = candidateListSchema.safeParse(value);
  return parsed.success ? parsed.data : [];
}

export function encodeCandidates(candidates: readonly string[]): string {
  return JSON.stringify(candidates);
}
