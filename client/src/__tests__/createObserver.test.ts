import { describe, it, expect, vi } from 'vitest';
import { DiscussionApi, PollingObserver, SocketObserver, StreamObserver, createObserver } from '../index.js';

describe('createObserver', () => {
  const api = new DiscussionApi('http://api.test', vi.fn());

  it('maps each transport to its observer', () => {
    expect(createObserver('polling', api)).toBeInstanceOf(PollingObserver);
    expect(createObserver('sse', api)).toBeInstanceOf(StreamObserver);
    expect(createObserver('websocket', api)).toBeInstanceOf(SocketObserver);
  });

  it('passes transport options through', async () => {
    const opened: string[] = [];
    const observer = createObserver('sse', api, {
      sse: {
        eventSource: (url, handlers) => {
          opened.push(url);
          handlers.onMessage('{"progress": 100, "message": "Discussion completed", "completed": true, "messages": []}');
          return { close: () => {} };
        },
      },
    });

    expect(await observer.observe(8)).toEqual({ progress: 100, message: 'Discussion completed', messages: [], completed: true });
    expect(opened).toEqual(['http://api.test/api/discussions/8/stream']);
  });
});
