import { ScrapeApiServer } from './app';

// 🧠 Initialize & Launch
void (async () => {
  const server = new ScrapeApiServer();
  await server.start();
})();
