/**
 * Digest delivery
 */

export interface Transport {
  /**
   * Resolves true when the document was handed off
   */
  send(document: string, recipient: string): Promise<boolean>;
}

export class ConsoleTransport implements Transport {
  constructor(private readonly write: (text: string) => void = (text) => process.stdout.write(text)) {}

  async send(document: string, recipient: string): Promise<boolean> {
    this.write(`To: ${recipient}\n\n${document}\n`);
    return true;
  }
}
