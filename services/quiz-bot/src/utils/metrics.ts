import { Registry, collectDefaultMetrics, Counter, Gauge } from 'prom-client';

export const registry = new Registry();

collectDefaultMetrics({ register: registry });

export const answersTotal = new Counter({
  name: 'quiz_bot_answers_total',
  help: 'Total number of graded answers',
  labelNames: ['verdict'],
  registers: [registry]
});

export const roundsTotal = new Counter({
  name: 'quiz_bot_rounds_total',
  help: 'Total number of finished quiz rounds',
  labelNames: ['outcome'],
  registers: [registry]
});

export const storeOperationsTotal = new Counter({
  name: 'quiz_bot_store_operations_total',
  help: 'Spreadsheet operations by outcome',
  labelNames: ['operation', 'status'],
  registers: [registry]
});

export const activeSessions = new Gauge({
  name: 'quiz_bot_active_sessions',
  help: 'Number of quiz rounds in progress',
  registers: [registry]
});

export const pendingWrites = new Gauge({
  name: 'quiz_bot_pending_writes',
  help: 'Review records buffered but not yet written to the spreadsheet',
  registers: [registry]
});
