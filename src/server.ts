import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createApp } from './infrastructure/http/createApp.js';

// API and inbox watcher share one container, so watcher imports are visible over HTTP.
const container = new AppContainer();
const app = createApp(container);
const port = container.config.app.port;
const controller = new AbortController();

const main = async () => {
  await container.prepare();

  const server = app.listen(port, () => {
    console.log(`🚀 Statement Inbox API listening on port ${port}`);
    console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
    console.log(`📥 Inbox: ${container.config.watcher.inboxDir}`);
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      console.log(`🛑 ${signal} received, shutting down`);
      controller.abort();
      server.close();
    });
  }

  await container.poller.start(controller.signal);
};

main().catch((error: unknown) => {
  console.error('Server crashed:', error);
  process.exitCode = 1;
});
