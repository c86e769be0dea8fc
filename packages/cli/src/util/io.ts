/** The part of a writable stream the CLI needs (satisfied by `process.stdout`). */
export interface TextWriter {
  write(text: string): unknown;
}

/** IO dependencies for the CLI (abstracted for testing). */
export interface MainIo {
  cwd: string;
  stdout: TextWriter;
  stderr: TextWriter;
}
