/**
 * Output formatting
 */

import { metrics, toJSON, type ModelConfig, type Operation } from "@modelstore/sdk";

/**
 * Render a model config in its storage form, without the internal doc_type marker
 */
export function formatModelConfig(config: ModelConfig, raw = false): string {
  return raw ? JSON.stringify(toJSON(config)) : JSON.stringify(toJSON(config), null, 2);
}

/**
 * One-line summary of an SDK operation's counters, or undefined if it never ran
 */
export function formatOperationMetrics(op: Operation): string | undefined {
  const recorded = metrics.getMetrics(op);
  if (!recorded) {
    return undefined;
  }

  const parts = [
    `metric ${op}`,
    `success=${recorded.successCount}`,
    `failure=${recorded.failureCount}`,
    ...Object.entries(recorded.failuresByCode).map(([code, count]) => `${code}=${count}`),
    `p95_ms=${metrics.getP95Duration(op).toFixed(2)}`,
  ];
  return parts.join(" ");
}

/**
 * Red text on a terminal, plain text otherwise
 */
export function errorText(text: string, stream: { isTTY?: boolean } = process.stderr): string {
  return stream.isTTY === true ? `\x1b[31m${text}\x1b[0m` : text;
}
