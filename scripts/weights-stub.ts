/**
 * Weight / Start Date Stub
 *
 * Serves the two endpoints the exporter can poll, for local development:
 *   GET /weights     -> { "mb_weight": …, "vcpu_weight": … }
 *   GET /start-date  -> { "start_date": "…" }
 *
 * Values come from STUB_MB_WEIGHT, STUB_VCPU_WEIGHT and STUB_START_DATE.
 *
 * Run: npm run weights-stub
 * Then: npm start -- -d resources/dummy_machines.yaml \
 *         --weight-update-endpoint http://localhost:8090/weights \
 *         --start-date-endpoint http://localhost:8090/start-date
 */

import Fastify from 'fastify';

const PORT = parseInt(process.env.STUB_PORT || '8090', 10);

function log(emoji: string, message: string) {
  console.log(`${emoji}  ${message}`);
}

const app = Fastify({ logger: false });

app.get('/weights', async () => {
  return {
    mb_weight: Number(process.env.STUB_MB_WEIGHT || '1'),
    vcpu_weight: Number(process.env.STUB_VCPU_WEIGHT || '1'),
  };
});

app.get('/start-date', async () => {
  const startOfMonth = new Date();
  startOfMonth.setUTCDate(1);
  startOfMonth.setUTCHours(0, 0, 0, 0);
  return { start_date: process.env.STUB_START_DATE || startOfMonth.toISOString() };
});

const start = async () => {
  try {
    await app.listen({ port: PORT, host: '127.0.0.1' });
    log('⚖️', `Weight stub running on http://localhost:${PORT}`);
  } catch (err) {
    console.error(err);
    process.exit(1);
  }
};

start();
