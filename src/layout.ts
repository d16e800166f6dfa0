// src/layout.ts — Tier folder layout and bootstrap

import { existsSync, mkdirSync } from "node:fs";
import { join, resolve } from "node:path";
import { TIER_NAMES } from "./types.js";
import type { TierLayout } from "./types.js";
import type { Logger } from "./logger.js";

export function resolveLayout(root: string): TierLayout {
  const absRoot = resolve(root);
  return {
    root: absRoot,
    daily: join(absRoot, "daily"),
    weekly: join(absRoot, "weekly"),
    monthly: join(absRoot, "monthly"),
    yearly: join(absRoot, "yearly"),
    quarantine: join(absRoot, "quarantine"),
  };
}

/**
 * Create the missing tier folders, but only when `daily` already exists.
 * Without `daily` nothing is created and every scan finds nothing.
 * Returns the folders created.
 */
export function bootstrapFolders(layout: TierLayout, logger: Logger): string[] {
  if (!existsSync(layout.daily)) {
    logger.info(`Folder "${layout.daily}" not found, no tier folders created`);
    return [];
  }

  const created: string[] = [];
  for (const tier of TIER_NAMES) {
    const folder = layout[tier];
    if (existsSync(folder)) continue;
    logger.info(`Creating folder "${folder}"`);
    mkdirSync(folder, { recursive: true });
    created.push(folder);
  }
  return created;
}
