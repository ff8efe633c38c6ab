#!/usr/bin/env node
import 'dotenv/config';
import type http from 'node:http';
import qrcode from 'qrcode-terminal';
import { resolveServerConfig } from './config.js';
import { createServerContext } from './context.js';
import { readErrnoCode } from './errors.js';
import { resolveBindTarget, startFileServer, stopFileServer, type RunningServer } from './http-server.js';

function registerShutdown(server: http.Server, flushAccessLog: () => Promise<void>): void {
  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`[lanshare] ${signal} received, shutting down`);
    Promise.all([stopFileServer(server), flushAccessLog()])
      .then(() => {
        process.exit(0);
      })
      .catch((error: unknown) => {
        const text = error instanceof Error ? error.message : String(error);
        console.log(`[lanshare] shutdown: ${text}`);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  const config = resolveServerConfig(process.argv.slice(2));
  const context = await createServerContext(config);
  const target = resolveBindTarget(config.host);

  let running: RunningServer;
  try {
    running = await startFileServer(context, target.bindHost);
  } catch (error) {
    if (readErrnoCode(error) === 'EADDRINUSE') {
      console.log(`[lanshare] port ${config.port} is already in use`);
      console.log(`[lanshare] try a different port: --port ${config.port + 1}`);
    } else {
      const text = error instanceof Error ? error.message : String(error);
      console.log(`[lanshare] server error: ${text}`);
    }
    process.exit(1);
  }

  const { server, port } = running;
  console.log(`[lanshare] serving ${context.resolver.root}`);
  console.log(`[lanshare] local: http://localhost:${port}/`);
  if (target.bindHost === '0.0.0.0') {
    const networkUrl = `http://${target.displayHost}:${port}/`;
    console.log(`[lanshare] network: ${networkUrl}${target.iface ? ` (${target.iface})` : ''}`);
    console.log('[lanshare] scan to open on a phone:');
    qrcode.generate(networkUrl, { small: true });
  } else if (target.bindHost !== 'localhost') {
    console.log(`[lanshare] network: http://${target.displayHost}:${port}/`);
  }
  if (config.searchParentTree) {
    console.log('[lanshare] download search may reach into the parent directory tree');
  }
  console.log('[lanshare] press Ctrl+C to stop');

  registerShutdown(server, () => context.accessLog.flush());
}

main().catch((error: unknown) => {
  const text = error instanceof Error ? error.message : String(error);
  console.log(`[lanshare] failed to start: ${text}`);
  process.exit(1);
});
