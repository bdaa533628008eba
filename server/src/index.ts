import { loadConfig } from './config.js';
import { DiscussionServer } from './DiscussionServer.js';
import { createDiscussionStore } from './StoreFactory.js';

const config = loadConfig();
const store = await createDiscussionStore(config);
const server = DiscussionServer.fromConfig(config, store);

let shuttingDown = false;
const shutdown = async () => {
  if (shuttingDown) return;
  shuttingDown = true;
  try {
    await server.close();
    process.exit(0);
  } catch (err) {
    console.error('[Server] Shutdown failed:', err);
    process.exit(1);
  }
};

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

// The Claude Agent SDK reports "Operation aborted" as an unhandled rejection
// whenever an AbortController fires on a live session, which is what a
// strategy timeout does. Ignore it; anything else is a real bug.
process.on('unhandledRejection', (reason) => {
  const msg = reason instanceof Error ? reason.message : String(reason);
  if (msg === 'Operation aborted' || msg === 'This operation was aborted') return;
  console.error('[Server] Unhandled rejection:', reason);
  process.exit(1);
});

await server.listen(config.port, config.host);
