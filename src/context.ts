import { AccessLogger, noopAccessLog, type AccessLogSink } from './access-log.js';
import type { ServerConfig } from './config.js';
import { PathResolver } from './path-resolver.js';
import { HtmlListingRenderer, type ListingRenderer } from './views/listing-view.js';

export interface ServerContext {
  config: ServerConfig;
  resolver: PathResolver;
  renderer: ListingRenderer;
  accessLog: AccessLogSink;
  chunkSize?: number;
}

export interface ServerContextOverrides {
  renderer?: ListingRenderer;
  accessLog?: AccessLogSink;
  chunkSize?: number;
}

export async function createServerContext(
  config: ServerConfig,
  overrides: ServerContextOverrides = {}
): Promise<ServerContext> {
  const resolver = await PathResolver.create(config.directory, {
    searchParentTree: config.searchParentTree,
    parentDepth: config.searchDepth,
    directoryLimit: config.searchDirectoryLimit
  });

  const accessLog =
    overrides.accessLog ??
    (config.accessLogDir
      ? new AccessLogger({ dir: config.accessLogDir, retentionDays: config.accessLogRetentionDays })
      : noopAccessLog);

  return {
    config,
    resolver,
    renderer: overrides.renderer ?? new HtmlListingRenderer(),
    accessLog,
    chunkSize: overrides.chunkSize
  };
}
