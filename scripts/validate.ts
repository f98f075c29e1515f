/**
 * Exporter Validation Script
 *
 * Checks a running exporter end to end:
 * 1. Wait for /health
 * 2. Read the last snapshot from /v1/snapshot
 * 3. Scrape /metrics and compare every project gauge with the snapshot
 *
 * Run: npm start -- -d resources/dummy_machines.yaml -i 5
 * Then: npx tsx scripts/validate.ts
 */

import { HealthResponseSchema, SnapshotResponseSchema } from '../src/api/schemas';
import { validate } from '../src/api/validation';
import { GAUGE_NAMES } from '../src/utils/metrics-sink';

const API_BASE = process.env.EXPORTER_URL || 'http://localhost:8080';

function log(emoji: string, message: string) {
  console.log(`${emoji}  ${message}`);
}

async function waitForExporter(maxAttempts = 30): Promise<boolean> {
  log('⏳', 'Waiting for exporter to be ready...');

  for (let i = 0; i < maxAttempts; i++) {
    try {
      const response = await fetch(`${API_BASE}/health`);
      if (response.ok) {
        const body = validate(HealthResponseSchema, await response.json());
        if (body.valid && body.value.tick !== null) {
          log('✅', `Exporter is ready (tick ${body.value.tick})`);
          return true;
        }
      }
    } catch {
      // Not listening yet
    }
    await new Promise((resolve) => setTimeout(resolve, 1000));
  }

  return false;
}

/**
 * Find the sample line of a gauge with exactly these labels
 */
function findSample(exposition: string, gauge: string, labels: Record<string, string>): number | undefined {
  for (const line of exposition.split('\n')) {
    if (!line.startsWith(`${gauge}{`)) continue;
    const matches = Object.entries(labels).every(([key, value]) => line.includes(`${key}="${value}"`));
    if (matches) {
      return Number(line.slice(line.lastIndexOf(' ') + 1));
    }
  }
  return undefined;
}

async function main() {
  if (!(await waitForExporter())) {
    log('❌', `No snapshot published at ${API_BASE}`);
    process.exit(1);
  }

  const result = validate(SnapshotResponseSchema, await (await fetch(`${API_BASE}/v1/snapshot`)).json());
  if (!result.valid) {
    log('❌', `Unexpected snapshot response: ${result.reason}`);
    process.exit(1);
  }
  const snapshot = result.value;
  const exposition = await (await fetch(`${API_BASE}/metrics`)).text();

  let failures = 0;
  for (const metric of snapshot.metrics) {
    const scraped = findSample(exposition, GAUGE_NAMES[metric.name], metric.labels);
    if (scraped === metric.value) {
      log('✅', `${metric.labels.project_name} ${metric.name} = ${metric.value}`);
    } else {
      failures++;
      log('❌', `${metric.labels.project_name} ${metric.name}: snapshot ${metric.value}, scraped ${scraped}`);
    }
  }

  log(failures === 0 ? '🎉' : '💥', `${snapshot.metrics.length - failures}/${snapshot.metrics.length} metrics match`);
  process.exit(failures === 0 ? 0 : 1);
}

main();
