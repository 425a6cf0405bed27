/**
 * State maintenance commands: clear-rate-limit, reset, cleanup
 */

import type { CommandContext } from "../../context.js";

export async function clearRateLimit(ctx: CommandContext, provider: string, model?: string): Promise<void> {
  await ctx.manager.clearRateLimit(provider, model);
  ctx.out.success(model ? `Cleared rate limit for ${provider}:${model}` : `Cleared rate limit for ${provider}`);
}

export async function resetState(ctx: CommandContext): Promise<void> {
  await ctx.manager.reset();
  ctx.out.success("Harness state reset");
}

export async function cleanup(ctx: CommandContext, options: { days?: number } = {}): Promise<void> {
  const days = options.days ?? ctx.config.state.retentionDays;
  const removed = await ctx.store.cleanupOldState(days);
  if (removed) {
    ctx.out.success(`Removed state older than ${days} day(s)`);
  } else {
    ctx.out.info(`No state older than ${days} day(s)`);
  }
}
