import { describe, expect, it } from 'vitest';
import { DEFAULT_MESSAGE_DURATION_MS, TransientMessage } from './transient-message';

describe('TransientMessage', () => {
  it('shows a message until its deadline', () => {
    const message = new TransientMessage();
    message.show('Bookmark added', 1000);

    expect(message.current(1000)).toBe('Bookmark added');
    expect(message.current(1000 + DEFAULT_MESSAGE_DURATION_MS - 1)).toBe('Bookmark added');
    expect(message.current(1000 + DEFAULT_MESSAGE_DURATION_MS)).toBeNull();
  });

  it('lets a newer message replace the current one', () => {
    const message = new TransientMessage(500);
    message.show('first', 0);
    message.show('second', 400, 1000);

    expect(message.current(600)).toBe('second');
    expect(message.current(1400)).toBeNull();
  });

  it('stays empty once expired', () => {
    const message = new TransientMessage(100);
    message.show('gone', 0);

    expect(message.current(100)).toBeNull();
    expect(message.current(50)).toBeNull();
  });

  it('can be cleared early', () => {
    const message = new TransientMessage();
    message.show('copied', 0);
    message.clear();

    expect(message.current(1)).toBeNull();
  });
});
