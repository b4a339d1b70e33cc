import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { createApp } from './app.js';
import { ContentStore } from './content-store.js';
import { FileReloader } from './reloader.js';
import type { ResolvedConfig } from '../config/types.js';
import { log } from '../utils/logger.js';

export interface RunningServer {
  server: Server;
  store: ContentStore;
  reloader: FileReloader;
  /** Bound address, useful when port 0 was requested */
  address: AddressInfo | string | null;
  close: () => Promise<void>;
}

/**
 * Load the configured file, start following it, and serve it over HTTP.
 *
 * @throws when the file cannot be loaded initially or the port cannot be bound
 */
export async function startServer(config: ResolvedConfig): Promise<RunningServer> {
  const store = new ContentStore();
  const controller = new AbortController();
  const reloader = new FileReloader({
    filePath: config.file,
    store,
    watchOptions: { pollIntervalMs: config.watch.pollIntervalMs },
    rewatchDelayMs: config.watch.rewatchDelayMs
  });

  await reloader.start(controller.signal);

  const app = createApp({
    store,
    filePath: config.file,
    route: config.server.route,
    contentType: config.server.contentType,
    isWatching: () => reloader.isWatching()
  });

  let server: Server;
  try {
    server = await listen(app, config.server.port, config.server.host);
  } catch (error) {
    controller.abort();
    await reloader.stopped();
    throw error;
  }

  log.info('Serving file', {
    file: config.file,
    route: config.server.route,
    host: config.server.host,
    port: config.server.port
  });

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        controller.abort();
        await Promise.all([reloader.stopped(), closeServer(server)]);
        log.info('Server stopped');
      })();
    }
    return closing;
  };

  return { server, store, reloader, address: server.address(), close };
}

function listen(app: ReturnType<typeof createApp>, port: number, host: string): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
