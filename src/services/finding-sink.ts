import type { Finding } from './posture-rules.js';

/** Where a scan cycle writes its output: one finding or banner per line. */
export interface FindingSink {
  writeFinding(finding: Finding): void;
  writeBanner(text: string): void;
}

export class StreamFindingSink implements FindingSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  writeFinding(finding: Finding): void {
    this.stream.write(`${finding}\n`);
  }

  writeBanner(text: string): void {
    this.stream.write(`${text}\n`);
  }
}
