import { describe, it, expect } from 'vitest';
import { ConversationContext } from '../conversationContext.js';

describe('ConversationContext', () => {
  it('should drop system messages from the stored history', () => {
    const context = new ConversationContext(
      [
        { role: 'system', content: 'old prompt' },
        { role: 'user', content: 'Hi' },
      ],
      10
    );

    expect(context.snapshot()).toEqual([{ role: 'user', content: 'Hi' }]);
  });

  it('should ignore blank and system additions', () => {
    const context = new ConversationContext([], 10);

    context.add('assistant', '   ').add('system', 'ignored').add('user', 'Offer?');

    expect(context.snapshot()).toEqual([{ role: 'user', content: 'Offer?' }]);
    expect(context.size).toBe(1);
  });

  it('should keep only the most recent messages', () => {
    const context = new ConversationContext([], 2);

    context.add('user', 'one').add('assistant', 'two').add('user', 'three');

    expect(context.snapshot().map((m) => m.content)).toEqual(['two', 'three']);
    expect(context.size).toBe(2);
  });

  it('should put the system prompt first and pending messages last', () => {
    const context = new ConversationContext([{ role: 'assistant', content: 'Welcome' }], 5);

    expect(context.toMessages('Be brief', { role: 'user', content: 'Price?' })).toEqual([
      { role: 'system', content: 'Be brief' },
      { role: 'assistant', content: 'Welcome' },
      { role: 'user', content: 'Price?' },
    ]);
  });

  it('should not share message objects with the history it was built from', () => {
    const history = [{ role: 'user' as const, content: 'Hi' }];
    const context = new ConversationContext(history, 5);

    context.add('assistant', 'Hello');

    expect(history).toHaveLength(1);
  });
});
