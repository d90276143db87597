export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type TransformName = 'regex' | 'substring' | 'fuzzy';

export interface SearchConfig {
  /** Backing command for `find` mode. `{dir}` is replaced by the quoted directory. */
  findCommand: string;
  /** Backing command for `grep` mode. */
  grepCommand: string;
  transform: TransformName;
}

export interface WorkerConfig {
  /** Executable that hosts the worker, usually the current Node binary. */
  command: string;
  args: string[];
  maxCandidates: number;
  /** Characters per response line before the worker continues with `-print-nonl`. */
  chunkSize: number;
  shell: string;
}

export interface SessionConfig {
  /** 0 disables the timeout. */
  requestTimeoutMs: number;
}

export interface PickerConfig {
  limit: number;
}

export interface AppConfig {
  search: SearchConfig;
  worker: WorkerConfig;
  session: SessionConfig;
  picker: PickerConfig;
  logLevel: LogLevel;
}
