/**
 * Token tracker: accumulates token usage across model calls.
 *
 * Tracks per-role and total token consumption for cost estimation
 * and usage visibility.
 *
 * Dependency direction: token-tracker.ts → agents/types, utils
 * Used by: study assistant factory, chat and ask commands
 */

import chalk from 'chalk';
import type { ModelRole } from '../../agents/types.js';
import { MODEL_ROLE_LABELS } from '../../agents/types.js';
import type { TokenUsage } from '../../providers/types.js';
import { logger } from '../../utils/logger.js';

/** Token usage for a single model call. */
export interface TokenUsageEntry {
  role: ModelRole;
  model: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  timestamp: number;
}

/** Estimated cost per 1M tokens for known hosted models. Local models are free. */
const COST_PER_1M_TOKENS: Record<string, { input: number; output: number }> = {
  // Anthropic
  'claude-sonnet-4-20250514': { input: 3.0, output: 15.0 },
  'claude-3-5-sonnet-20241022': { input: 3.0, output: 15.0 },
  'claude-3-5-haiku-20241022': { input: 0.8, output: 4.0 },
  // OpenAI
  'gpt-4o': { input: 2.5, output: 10.0 },
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  // Groq
  'llama-3.3-70b-versatile': { input: 0.59, output: 0.79 },
  'llama-3.1-8b-instant': { input: 0.05, output: 0.08 },
};

export class TokenTracker {
  private readonly entries: TokenUsageEntry[] = [];

  constructor(private readonly clock: () => number = Date.now) {}

  record(role: ModelRole, model: string, usage: TokenUsage): void {
    this.entries.push({
      role,
      model,
      promptTokens: usage.promptTokens,
      completionTokens: usage.completionTokens,
      totalTokens: usage.totalTokens,
      timestamp: this.clock(),
    });
  }

  getTotalTokens(): number {
    return this.entries.reduce((sum, e) => sum + e.totalTokens, 0);
  }

  getTokensByRole(): Partial<Record<ModelRole, number>> {
    const byRole: Partial<Record<ModelRole, number>> = {};
    for (const entry of this.entries) {
      byRole[entry.role] = (byRole[entry.role] ?? 0) + entry.totalTokens;
    }
    return byRole;
  }

  /**
   * Estimate total cost in USD based on known model pricing.
   */
  estimateCost(): number {
    let totalCost = 0;

    for (const entry of this.entries) {
      const pricing = COST_PER_1M_TOKENS[entry.model];
      if (pricing) {
        totalCost += (entry.promptTokens / 1_000_000) * pricing.input;
        totalCost += (entry.completionTokens / 1_000_000) * pricing.output;
      }
    }

    return totalCost;
  }

  getEntries(): readonly TokenUsageEntry[] {
    return this.entries;
  }

  /**
   * Print a summary of token usage to the console.
   */
  printSummary(): void {
    if (this.entries.length === 0) return;

    logger.blank();
    logger.header('Token Usage');

    const byRole = this.getTokensByRole();
    for (const entry of Object.entries(byRole)) {
      const [role, tokens] = entry;
      const label = isModelRole(role) ? MODEL_ROLE_LABELS[role] : role;
      console.log(chalk.gray(`  ${label}: ${(tokens ?? 0).toLocaleString()} tokens`));
    }

    console.log(chalk.bold(`  Total: ${this.getTotalTokens().toLocaleString()} tokens`));

    const cost = this.estimateCost();
    if (cost > 0) {
      console.log(chalk.yellow(`  Estimated cost: $${cost.toFixed(4)}`));
    }
  }
}

function isModelRole(value: string): value is ModelRole {
  return value in MODEL_ROLE_LABELS;
}
