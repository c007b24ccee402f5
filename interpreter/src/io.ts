/**
 * The IO channel between an interpreter and its host.
 *
 * Interpreters write text, draw primitives and input requests into the channel;
 * the engine hands queued events to the host one `step` at a time. Output is
 * line oriented: text written without a line terminator stays in a buffer
 * until the line is finished, something else is emitted, or an input request
 * takes it as its prompt.
 */

import { DrawPrimitive } from './turtle';
import { EngineUsageError, RuntimeErrorCategory, SourceLocation } from './errors';

export type CompletionReason = 'finished' | 'no-more-solutions' | 'aborted';

export type ExecutionEvent =
  | { kind: 'output'; text: string }
  | { kind: 'draw'; primitive: DrawPrimitive }
  | { kind: 'input-requested'; prompt?: string }
  | { kind: 'completed'; reason: CompletionReason }
  | { kind: 'runtime-error'; category: RuntimeErrorCategory; message: string; location?: SourceLocation };

export interface InputRequest {
  prompt?: string;
}

export class IOChannel {
  private readonly queue: ExecutionEvent[] = [];
  private buffer = '';
  /** The buffered text is a complete line held back as a possible prompt. */
  private held = false;
  private request: InputRequest | null = null;

  /**
   * Append text to the current line.
   */
  write(text: string): void {
    if (this.held) this.flush();
    this.buffer += text;
  }

  /**
   * Append text and terminate the line.
   */
  writeLine(text: string): void {
    this.write(text);
    this.queue.push({ kind: 'output', text: this.buffer });
    this.buffer = '';
  }

  /**
   * Emit a complete line that the next input request may use as its prompt
   * (PILOT `T:` before `A:`). Any other emission delivers it as output.
   */
  tell(text: string): void {
    this.flush();
    this.buffer = text;
    this.held = true;
  }

  draw(primitive: DrawPrimitive): void {
    this.flush();
    this.queue.push({ kind: 'draw', primitive });
  }

  /**
   * Queue an input request. Without an explicit prompt, pending line text
   * becomes the prompt.
   */
  requestInput(prompt?: string): void {
    if (this.request !== null) {
      throw new EngineUsageError('an input request is already outstanding');
    }
    let effective = prompt;
    if (effective === undefined && (this.buffer !== '' || this.held)) {
      effective = this.buffer;
      this.buffer = '';
      this.held = false;
    } else {
      this.flush();
    }
    this.request = effective === undefined ? {} : { prompt: effective };
    this.queue.push(requestEvent(this.request));
  }

  /**
   * Re-issue the outstanding request after a coercion failure.
   */
  repeatRequest(): ExecutionEvent {
    if (this.request === null) {
      throw new EngineUsageError('no input request is outstanding');
    }
    const event = requestEvent(this.request);
    this.queue.push(event);
    return event;
  }

  get pendingRequest(): InputRequest | null {
    return this.request;
  }

  clearRequest(): void {
    this.request = null;
  }

  /**
   * Deliver any buffered text as an output event.
   */
  flush(): void {
    if (this.buffer !== '' || this.held) {
      this.queue.push({ kind: 'output', text: this.buffer });
    }
    this.buffer = '';
    this.held = false;
  }

  emit(event: ExecutionEvent): void {
    this.flush();
    this.queue.push(event);
  }

  hasEvents(): boolean {
    return this.queue.length > 0;
  }

  shift(): ExecutionEvent | undefined {
    return this.queue.shift();
  }

  /** Drop everything not yet delivered (used by abort). */
  discard(): void {
    this.queue.length = 0;
    this.buffer = '';
    this.held = false;
    this.request = null;
  }
}

function requestEvent(request: InputRequest): ExecutionEvent {
  return request.prompt === undefined
    ? { kind: 'input-requested' }
    : { kind: 'input-requested', prompt: request.prompt };
}
