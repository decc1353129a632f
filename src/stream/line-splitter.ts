// ── Line reassembly ───────────────────────────────────────────────────────────
// Turns arbitrary chunks from a socket, serial port or file into complete
// "\r\n"-terminated sentences. A partial line waits for the next chunk.

import { Buffer } from 'node:buffer'

export const LINE_DELIMITER = '\r\n'

export class LineSplitter {
  private lineBuffer = ''

  // Returns every line completed by this chunk, without the delimiter
  push(chunk: string | Uint8Array): string[] {
    this.lineBuffer += typeof chunk === 'string' ? chunk : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength).toString('latin1')
    const lines = this.lineBuffer.split(LINE_DELIMITER)
    this.lineBuffer = lines.pop() ?? ''
    return lines.filter(line => line.length > 0)
  }

  // Whatever is left after the last delimiter
  flush(): string {
    const rest = this.lineBuffer
    this.lineBuffer = ''
    return rest
  }

  get pending(): number {
    return this.lineBuffer.length
  }
}
