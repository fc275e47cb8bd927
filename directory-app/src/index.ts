import { createRunner } from './store.js';
import { buildServer } from './api/server.js';

const DATABASE_URL = process.env['DATABASE_URL'];
if (!DATABASE_URL) {
  console.error('Error: DATABASE_URL environment variable is required');
  process.exit(1);
}

const PORT = parseInt(process.env['PORT'] ?? '3000', 10);

const runner = createRunner(DATABASE_URL);
const app = buildServer(runner);

try {
  await app.listen({ port: PORT, host: '0.0.0.0' });
} catch (err) {
  app.log.error(err);
  await runner.close();
  process.exit(1);
}

process.on('SIGTERM', () => {
  app.close()
    .then(() => runner.close())
    .catch((err: unknown) => app.log.error(err));
});
