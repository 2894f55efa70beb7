export interface RenderSink {
  write(html: string): void;
  end(): void;
}

export class StringSink implements RenderSink {
  private chunks: string[] = [];
  private ended = false;

  write(html: string) {
    if (!html) return;
    if (this.ended) {
      throw new Error('StringSink: write() after end()');
    }
    this.chunks.push(html);
  }

  end() {
    this.ended = true;
  }

  toString() {
    return this.chunks.join('');
  }
}
