import { EngineUsageError } from '../src/errors';
import { ExecutionEvent, IOChannel } from '../src/io';

function drain(channel: IOChannel): ExecutionEvent[] {
  const events: ExecutionEvent[] = [];
  for (let e = channel.shift(); e !== undefined; e = channel.shift()) events.push(e);
  return events;
}

describe('IOChannel', () => {
  test('writes accumulate until the line ends', () => {
    const channel = new IOChannel();
    channel.write('A');
    channel.write('B');
    expect(channel.hasEvents()).toBe(false);
    channel.writeLine('C');
    expect(drain(channel)).toEqual([{ kind: 'output', text: 'ABC' }]);
  });

  test('an empty line is still an output event', () => {
    const channel = new IOChannel();
    channel.writeLine('');
    expect(drain(channel)).toEqual([{ kind: 'output', text: '' }]);
  });

  test('a draw flushes the open line first', () => {
    const channel = new IOChannel();
    channel.write('partial');
    channel.draw({ kind: 'clear' });
    expect(drain(channel)).toEqual([
      { kind: 'output', text: 'partial' },
      { kind: 'draw', primitive: { kind: 'clear' } },
    ]);
  });

  test('unterminated text becomes the prompt of the next request', () => {
    const channel = new IOChannel();
    channel.write('Name? ');
    channel.requestInput();
    expect(drain(channel)).toEqual([{ kind: 'input-requested', prompt: 'Name? ' }]);
  });

  test('told text is held back as a prompt', () => {
    const channel = new IOChannel();
    channel.tell('What is your name?');
    channel.requestInput();
    expect(drain(channel)).toEqual([{ kind: 'input-requested', prompt: 'What is your name?' }]);
  });

  test('told text is delivered as output when anything else follows', () => {
    const channel = new IOChannel();
    channel.tell('Hello');
    channel.writeLine('World');
    expect(drain(channel)).toEqual([
      { kind: 'output', text: 'Hello' },
      { kind: 'output', text: 'World' },
    ]);
  });

  test('an explicit prompt flushes pending text as output', () => {
    const channel = new IOChannel();
    channel.write('Welcome');
    channel.requestInput('Age');
    expect(drain(channel)).toEqual([
      { kind: 'output', text: 'Welcome' },
      { kind: 'input-requested', prompt: 'Age' },
    ]);
  });

  test('only one request may be outstanding', () => {
    const channel = new IOChannel();
    channel.requestInput();
    expect(() => channel.requestInput()).toThrow(EngineUsageError);
    channel.clearRequest();
    expect(() => channel.requestInput()).not.toThrow();
  });

  test('repeatRequest re-issues the same request', () => {
    const channel = new IOChannel();
    channel.requestInput('N');
    drain(channel);
    expect(channel.repeatRequest()).toEqual({ kind: 'input-requested', prompt: 'N' });
    expect(drain(channel)).toEqual([{ kind: 'input-requested', prompt: 'N' }]);
  });

  test('repeatRequest without a request is a usage error', () => {
    expect(() => new IOChannel().repeatRequest()).toThrow(EngineUsageError);
  });

  test('discard drops everything undelivered', () => {
    const channel = new IOChannel();
    channel.writeLine('one');
    channel.write('two');
    channel.requestInput();
    channel.discard();
    expect(channel.hasEvents()).toBe(false);
    expect(channel.pendingRequest).toBeNull();
  });
});
