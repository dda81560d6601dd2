
export interface OutputSink {
  put(line: string): void;
}

export const StdoutSink: OutputSink = {
  put: (line) => { process.stdout.write(line + '\n'); },
};

export class CollectingSink implements OutputSink {
  readonly lines: string[] = [];
  put(line: string) { this.lines.push(line); }
}
