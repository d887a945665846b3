import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const container = new AppContainer();
const controller = new AbortController();

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    console.log(`🛑 ${signal} received, stopping after the current cycle`);
    controller.abort();
  });
}

const main = async () => {
  await container.prepare();
  console.log(`📥 Inbox: ${container.config.watcher.inboxDir}`);
  console.log(`🤖 Normalizer: ${container.config.normalizer.model} @ ${container.config.normalizer.baseUrl}`);
  await container.poller.start(controller.signal);
};

main().catch((error: unknown) => {
  console.error('Watcher crashed:', error);
  process.exitCode = 1;
});
