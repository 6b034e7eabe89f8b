import { describe, expect, it } from 'vitest';
import { NotificationDispatcher } from '../src/services/notification.service';
import { CapturingSender } from './helpers/server';

const mail = { to: 'sam@example.edu', subject: 'Borrower slip', html: '<p>hi</p>' };

describe('NotificationDispatcher', () => {
  it('retries a failed delivery until it goes through', async () => {
    const sender = new CapturingSender();
    sender.failuresLeft = 2;
    const dispatcher = new NotificationDispatcher(sender, { maxAttempts: 3, retryDelayMs: 1 });

    dispatcher.enqueue('slip', async () => mail);
    await dispatcher.drain();

    expect(sender.sent).toEqual([mail]);
    expect(sender.failuresLeft).toBe(0);
  });

  it('gives up after the configured attempts without throwing', async () => {
    const sender = new CapturingSender();
    sender.failuresLeft = 10;
    const dispatcher = new NotificationDispatcher(sender, { maxAttempts: 2, retryDelayMs: 1 });

    dispatcher.enqueue('slip', async () => mail);
    await dispatcher.drain();

    expect(sender.sent).toEqual([]);
    expect(sender.failuresLeft).toBe(8);
  });

  it('drops a message whose body cannot be built', async () => {
    const sender = new CapturingSender();
    const dispatcher = new NotificationDispatcher(sender, { maxAttempts: 2, retryDelayMs: 1 });

    dispatcher.enqueue('slip', async () => {
      throw new Error('render failed');
    });
    dispatcher.enqueue('second slip', async () => mail);
    await dispatcher.drain();

    expect(sender.sent).toEqual([mail]);
  });

  it('reports immediate delivery results', async () => {
    const sender = new CapturingSender();
    const dispatcher = new NotificationDispatcher(sender, { maxAttempts: 1, retryDelayMs: 1 });

    expect(await dispatcher.deliverNow('code', mail)).toBe(true);
    sender.failuresLeft = 1;
    expect(await dispatcher.deliverNow('code', mail)).toBe(false);
  });

  it('does nothing when mail is not configured', async () => {
    const dispatcher = new NotificationDispatcher(null, { maxAttempts: 1, retryDelayMs: 1 });

    expect(dispatcher.enabled).toBe(false);
    dispatcher.enqueue('slip', async () => mail);
    await dispatcher.drain();
    expect(await dispatcher.deliverNow('code', mail)).toBe(false);
  });
});
