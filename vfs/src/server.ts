import { getConfig } from './config.js';
import { RealDebridClient } from './debrid/realdebrid.js';
import { RemoteFs } from './fs/remote-fs.js';
import { NamespaceEngine } from './namespace/engine.js';
import { createServer } from './routes/index.js';
import { startRuleFileWatcher, stopRuleFileWatcher } from './watcher.js';

async function main() {
  const config = getConfig();

  console.log('=================================');
  console.log('  Debrid VFS Service');
  console.log('=================================');
  console.log(`Port: ${config.port}`);
  console.log(`Sort file: ${config.sortFile}`);
  console.log(`Refresh interval: ${config.refreshInterval}s`);
  console.log(`Invalid regex: ${config.invalidRegex}`);
  console.log('');

  const client = new RealDebridClient({
    apiKey: config.realdebrid.apiKey,
    apiUrl: config.realdebrid.apiUrl,
    timeout: config.realdebrid.timeout,
    retry: config.retry,
  });

  if (!client.isConfigured()) {
    console.error('REALDEBRID_API_KEY is not set');
    process.exit(1);
  }
  await client.testConnection();

  const engine = NamespaceEngine.fromConfig(config, client);
  const fs = new RemoteFs(engine);
  const fastify = await createServer(fs);

  if (config.watchSortFile) {
    startRuleFileWatcher(engine, config.sortFile);
  }

  const shutdown = async (signal: string) => {
    console.log(`Received ${signal}, shutting down...`);
    engine.shutdown();
    await stopRuleFileWatcher();
    await fastify.close();
    process.exit(0);
  };
  process.once('SIGTERM', () => {
    shutdown('SIGTERM').catch(console.error);
  });
  process.once('SIGINT', () => {
    shutdown('SIGINT').catch(console.error);
  });

  // Start server
  try {
    await fastify.listen({ port: config.port, host: config.host });
    console.log(`Server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }

  // Build the tree once so the first listing is fast
  try {
    await engine.rebuild();
  } catch (err) {
    console.error('Initial index failed:', err instanceof Error ? err.message : err);
  }
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
