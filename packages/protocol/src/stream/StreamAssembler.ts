/**
 * Joins `stream:chunk` text for one streamed message at a time. Chunks for a
 * different message id restart accumulation.
 */
export class StreamAssembler {
  private text = '';
  private messageId: string | null = null;

  /** Appends a chunk and returns the text received so far for `messageId`. */
  append(messageId: string, chunk: string): string {
    if (this.messageId !== messageId) {
      this.text = '';
      this.messageId = messageId;
    }
    this.text += chunk;
    return this.text;
  }

  get currentMessageId(): string | null {
    return this.messageId;
  }

  /** Returns the full text and clears the buffer, or `null` if nothing was streamed. */
  finish(): string | null {
    if (this.text === '') return null;
    const result = this.text;
    this.reset();
    return result;
  }

  reset(): void {
    this.text = '';
    this.messageId = null;
  }
}
