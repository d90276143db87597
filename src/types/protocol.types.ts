/** Run the filter over the worker's current candidates. Terms are regex sources. */
export interface FilterInstruction {
  op: 'filter';
  terms: string[];
}

/** Replace the worker's candidate source with the output of a shell command. */
export interface StartInstruction {
  op: 'start';
  command: string;
}

export interface ShutdownInstruction {
  op: 'shutdown';
}

export type Instruction = FilterInstruction | StartInstruction | ShutdownInstruction;

export type ResponseLine =
  | { kind: 'print'; payload: string }
  | { kind: 'print-nonl'; payload: string }
  | { kind: 'unknown'; raw: string };
