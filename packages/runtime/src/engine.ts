// Engine - wires storage, caches, compiler and logging from one configuration

import type { CheckerKind } from '@tessera/protocol';
import { withChangeNotifications } from '@tessera/repositories';
import type { Storage } from '@tessera/repositories';
import { loadConfig, type EngineConfig } from './config.js';
import { PatternCompiler } from './compiler/index.js';
import { createChecker } from './checkers/index.js';
import { EnfoldCache, GuardCache } from './cache/index.js';
import { Guard, type AuditLogger } from './guard/index.js';
import { createPinoLogger, type Logger } from './logging/index.js';

export type CreateEngineOptions = {
  /**
   * Overrides on top of the configuration read from process.env
   */
  config?: Partial<EngineConfig>;

  /**
   * Defaults to a pino logger at the configured level
   */
  logger?: Logger;

  /**
   * When given, the storage is fronted by an EnfoldCache over this storage
   * and warmed up before the engine is returned.
   */
  cacheStorage?: Storage;

  auditLogger?: AuditLogger;
};

export type Engine = {
  /**
   * The storage to write policies through. Writes invalidate the GuardCache.
   */
  storage: Storage;
  compiler: PatternCompiler;
  guardCache: GuardCache;
  logger: Logger;
  config: EngineConfig;

  /**
   * A guard over the engine storage using a built-in checker
   */
  guard(kind: CheckerKind): Guard;
};

/**
 * Create an engine over a storage.
 *
 * @example
 * ```typescript
 * const engine = await createEngine(new MemoryStorage());
 * await engine.storage.add(createPolicy({ uid: '1', effect: 'allow', subjects: ['Max'] }));
 * const allowed = await engine.guard('regex').isAllowed(createInquiry({ subject: 'Max' }));
 * ```
 */
export async function createEngine(
  storage: Storage,
  options: CreateEngineOptions = {}
): Promise<Engine> {
  const config: EngineConfig = { ...loadConfig(), ...options.config };
  const logger = options.logger ?? createPinoLogger({ level: config.logLevel });

  let backing = storage;
  if (options.cacheStorage) {
    const enfold = new EnfoldCache(storage, {
      cache: options.cacheStorage,
      batchSize: config.warmupBatchSize,
      logger,
    });
    await enfold.populate();
    backing = enfold;
  }

  const compiler = new PatternCompiler({ maxSize: config.patternCacheSize });
  const guardCache = new GuardCache(backing, { maxSize: config.guardCacheSize });
  const observed = withChangeNotifications(backing, (change) => {
    logger.debug('Policy set changed', { change: change.type, uid: change.uid });
    guardCache.invalidate();
  });
  guardCache.markFresh();

  const guards = new Map<CheckerKind, Guard>();

  return {
    storage: observed,
    compiler,
    guardCache,
    logger,
    config,
    guard(kind) {
      let guard = guards.get(kind);
      if (!guard) {
        guard = new Guard(observed, createChecker(kind, { compiler }), {
          logger,
          cache: guardCache,
          auditLogger: options.auditLogger,
        });
        guards.set(kind, guard);
      }
      return guard;
    },
  };
}
