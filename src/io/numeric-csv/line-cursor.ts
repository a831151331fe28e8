import { InputError } from '../../errors';
import type { Result } from '../../types/result';
import { err, ok } from '../../types/result';

/** A chunk of input text, either decoded or raw UTF-8 bytes */
export type InputChunk = string | Uint8Array;

/** Anything that yields input chunks in order, such as a Node.js Readable */
export type InputSource = AsyncIterable<InputChunk> | Iterable<InputChunk>;

/**
 * Forward-only cursor over the lines of a chunked input source.
 *
 * Lines end at "\n"; a single "\r" before it is dropped. A final line without
 * a terminator is yielded only when it is non-empty.
 */
export class LineCursor {
  private readonly iterator: AsyncIterator<InputChunk> | Iterator<InputChunk>;
  private readonly decoder = new TextDecoder('utf-8');
  private pending = '';
  private sourceDone = false;

  /** Number of lines yielded so far */
  lineNumber = 0;

  constructor(source: InputSource) {
    this.iterator = isAsyncIterable(source)
      ? source[Symbol.asyncIterator]()
      : source[Symbol.iterator]();
  }

  /**
   * Advances one line. Resolves to null once the source is exhausted.
   */
  async next(): Promise<Result<string | null, InputError>> {
    while (true) {
      const newline = this.pending.indexOf('\n');
      if (newline !== -1) {
        const line = this.pending.slice(0, newline);
        this.pending = this.pending.slice(newline + 1);
        return ok(this.emit(line));
      }

      if (this.sourceDone) {
        if (this.pending === '') return ok(null);
        const line = this.pending;
        this.pending = '';
        return ok(this.emit(line));
      }

      const pulled = await this.pull();
      if (!pulled.ok) return pulled;
    }
  }

  private emit(line: string): string {
    this.lineNumber++;
    return line.endsWith('\r') ? line.slice(0, -1) : line;
  }

  private async pull(): Promise<Result<void, InputError>> {
    let step: IteratorResult<InputChunk>;
    try {
      step = await this.iterator.next();
    } catch (error) {
      return err(new InputError('input source failed', error));
    }

    if (step.done) {
      this.sourceDone = true;
      this.pending += this.decoder.decode();
      return ok(undefined);
    }

    const chunk: unknown = step.value;
    if (typeof chunk === 'string') {
      this.pending += this.decoder.decode() + chunk;
    } else if (chunk instanceof Uint8Array) {
      this.pending += this.decoder.decode(chunk, { stream: true });
    } else {
      return err(
        new InputError(
          `unsupported chunk type '${typeof chunk}'`,
          undefined,
          'the source must yield strings or Uint8Array chunks',
        ),
      );
    }
    return ok(undefined);
  }
}

function isAsyncIterable(source: InputSource): source is AsyncIterable<InputChunk> {
  return typeof source !== 'string' && Symbol.asyncIterator in source;
}

/** Wraps a string as a single-chunk input source */
export function sourceFromString(text: string): InputSource {
  return [text];
}
