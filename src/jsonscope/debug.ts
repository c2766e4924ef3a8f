/**
 * Minimal debug infrastructure for jsonscope
 * Gated on JSONSCOPE_DEBUG; counters are always kept
 */

export const DEBUG =
  process.env.JSONSCOPE_DEBUG === '1' || process.env.JSONSCOPE_DEBUG === 'true';

export interface OperationMetrics {
  parses: number;
  parseFailures: number;
  expansions: number;
  searches: number;
  reconstructions: number;
  reconstructionFallbacks: number;
}

interface FallbackRecord {
  nodeId: string;
  error: string;
  timestamp: string;
}

const MAX_FALLBACK_RECORDS = 20;

let metrics: OperationMetrics = emptyMetrics();
const fallbackRecords: FallbackRecord[] = [];

function emptyMetrics(): OperationMetrics {
  return {
    parses: 0,
    parseFailures: 0,
    expansions: 0,
    searches: 0,
    reconstructions: 0,
    reconstructionFallbacks: 0,
  };
}

export function debugLog(
  scope: string,
  message: string,
  details?: Record<string, unknown>
): void {
  if (!DEBUG) return;
  if (details) {
    console.error(`[jsonscope:${scope}] ${message}`, details);
  } else {
    console.error(`[jsonscope:${scope}] ${message}`);
  }
}

export function countOperation(name: keyof OperationMetrics): void {
  metrics[name]++;
}

export function recordReconstructionFallback(
  nodeId: string,
  error: unknown
): void {
  metrics.reconstructionFallbacks++;
  fallbackRecords.push({
    nodeId,
    error: error instanceof Error ? error.message : String(error),
    timestamp: new Date().toISOString(),
  });
  if (fallbackRecords.length > MAX_FALLBACK_RECORDS) {
    fallbackRecords.shift();
  }

  if (DEBUG) {
    console.warn(`🚨 RECONSTRUCTION FALLBACK at ${nodeId}: ${String(error)}`);
  }
}

export function getMetrics(): OperationMetrics {
  return { ...metrics };
}

export function getFallbackRecords(): FallbackRecord[] {
  return [...fallbackRecords];
}

export function resetMetrics(): void {
  metrics = emptyMetrics();
  fallbackRecords.length = 0;
}

/**
 * Print operation counters to stderr
 */
export function printMetrics(): void {
  const snapshot = getMetrics();
  console.error('\n📊 JSONSCOPE OPERATIONS');
  console.error('======================');
  for (const [name, count] of Object.entries(snapshot)) {
    console.error(`  ${name}: ${count}`);
  }
  for (const record of fallbackRecords.slice(-5)) {
    console.error(`  [${record.timestamp}] ${record.nodeId}: ${record.error}`);
  }
}
