// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Entry Point
// Signals → personas → explainable recommendations
// ═══════════════════════════════════════════════════════════════

import { CONFIG } from './core/config.js';
import { createLogger } from './core/logger.js';
import { errorMessage } from './core/errors.js';
import { SqliteStore } from './storage/sqlite-store.js';
import { loadCatalog } from './catalog/catalog.js';
import { ToneGuardrail } from './guardrails/tone.js';
import { RecommendationEngine } from './recommend/orchestrator.js';
import { RecommendationService } from './recommend/service.js';
import { AuditTrail } from './traces/audit-trail.js';
import { createGateway } from './gateway/server.js';

async function main(): Promise<void> {
  const logger = createLogger('ledgerwise');

  logger.info('═══════════════════════════════════════════');
  logger.info(` ${CONFIG.platform.name} v${CONFIG.platform.version} starting...`);
  logger.info('═══════════════════════════════════════════');

  // ── 1. Storage ──
  const store = SqliteStore.open(CONFIG.database.path, createLogger('store'));
  const db = store.getDb();

  // ── 2. Catalog (a malformed catalog stops start-up) ──
  const catalog = loadCatalog(CONFIG.catalog.path);
  logger.info(`Catalog ${catalog.version}: ${catalog.education.length} education items, ${catalog.offers.length} offers`);

  // ── 3. Pipeline ──
  const engine = new RecommendationEngine({
    store,
    catalog,
    logger: createLogger('engine'),
    guardrail: new ToneGuardrail(createLogger('guardrail')),
    options: {
      educationMin: CONFIG.pipeline.educationMin,
      educationMax: CONFIG.pipeline.educationMax,
      offerMax: CONFIG.pipeline.offerMax,
      payrollMinAmount: CONFIG.pipeline.payrollMinAmount,
      currency: CONFIG.pipeline.currency,
    },
  });

  // ── 4. Audit trail ──
  const auditTrail = new AuditTrail(db, createLogger('audit'));
  auditTrail.attach(engine);
  const chain = auditTrail.verifyChain();
  if (!chain.valid) {
    logger.warn(`Audit chain broken at entry ${chain.brokenAt} of ${chain.totalEntries}`);
  }

  // ── 5. Gateway ──
  const service = new RecommendationService(engine, store, auditTrail, createLogger('service'));
  const { server } = createGateway({
    service,
    logger: createLogger('gateway'),
    apiKey: CONFIG.gateway.apiKey,
    defaultWindow: CONFIG.pipeline.defaultWindow,
    platform: CONFIG.platform,
    catalogVersion: catalog.version,
  });

  server.listen(CONFIG.gateway.port, CONFIG.gateway.host, () => {
    logger.info(`Gateway listening on http://${CONFIG.gateway.host}:${CONFIG.gateway.port}`);
    if (!CONFIG.gateway.apiKey) {
      logger.warn('GATEWAY_API_KEY is empty: the API is open');
    }
  });

  // ── Graceful shutdown ──
  let shuttingDown = false;

  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Shutting down (${signal})...`);

    server.close(err => {
      if (err) logger.error(`Server close failed: ${errorMessage(err)}`);
      db.close();
      logger.info('Shutdown complete.');
      process.exit(err ? 1 : 0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(err => {
  console.error('Fatal:', err);
  process.exit(1);
});
