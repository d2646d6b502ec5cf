// backend/services/shared/src/env.ts

/**
 * Env loading + validators shared by every service.
 *
 * Cascade (most specific wins): repo root → service family → service root;
 * variables already present in process.env are never overwritten.
 * Files tried per layer depend on NODE_ENV:
 *   dev:    env.dev → .env.dev → .env
 *   docker: env.docker → .env.docker → .env
 *   other:  .env (optional in production; prefer injected env)
 *
 * Boot policy (which vars are required) lives in each service's bootstrap.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

const ROOT_MARKERS = [".git", "package.json"];

/** Outermost ancestor of `start` carrying a root marker. */
function findRepoRoot(start: string): string {
  let found: string | undefined;
  let dir = path.resolve(start);
  while (true) {
    if (ROOT_MARKERS.some((m) => fs.existsSync(path.join(dir, m)))) found = dir;
    const up = path.dirname(dir);
    if (up === dir) return found ?? path.resolve(start, "..", "..");
    dir = up;
  }
}

function loadIfExists(file: string): boolean {
  if (!fs.existsSync(file)) return false;
  const result = dotenv.config({ path: file });
  if (result.error) {
    throw new Error(`Cannot read env file ${file}: ${result.error.message}`);
  }
  dotenvExpand.expand(result);
  return true;
}

export function envFilesForMode(mode: string): string[] {
  if (mode === "dev") return ["env.dev", ".env.dev", ".env"];
  if (mode === "docker") return ["env.docker", ".env.docker", ".env"];
  return [".env"];
}

/**
 * Cascading loader for a service. Accepts the service root or any directory
 * directly inside it (e.g. `src`). Returns the files that were loaded.
 */
export function loadEnvCascadeForService(
  dir: string,
  opts: { allowMissingInProd?: boolean } = {}
): string[] {
  const mode = process.env.NODE_ENV?.trim() ?? "";
  if (mode === "") {
    throw new Error("NODE_ENV is required (dev | docker | test | production).");
  }

  const abs = path.resolve(dir);
  const service = fs.existsSync(path.join(abs, "src")) ? abs : path.dirname(abs);
  const layers = [findRepoRoot(service), path.dirname(service), service];
  const candidates = layers.flatMap((layer) =>
    envFilesForMode(mode).map((name) => path.join(layer, name))
  );

  // dotenv never overwrites a set var, so walk most-specific first: the
  // service layer wins over family and repo root, injected env wins over all.
  const loaded = [...candidates].reverse().filter((p) => loadIfExists(p));

  // Dev/docker must load something; prod and test may rely on injected envs.
  const optional =
    mode === "test" || (mode === "production" && opts.allowMissingInProd !== false);
  if (loaded.length === 0 && !optional) {
    const looked = candidates.map((p) => `  - ${p}`).join("\n");
    throw new Error(`No env files found for mode="${mode}". Looked in:\n${looked}`);
  }
  return loaded;
}

const blank = (v: string | undefined): boolean => (v ?? "").trim() === "";

export function assertEnv(keys: readonly string[]): void {
  const missing = keys.filter((k) => blank(process.env[k]));
  if (missing.length > 0) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}

export function requireEnv(name: string): string {
  const value = process.env[name];
  if (value === undefined || blank(value)) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value.trim();
}

export function requireEnum<T extends string>(
  name: string,
  allowed: readonly T[]
): T {
  const v = requireEnv(name);
  const hit = allowed.find((a) => a === v);
  if (hit === undefined) {
    throw new Error(
      `Invalid env var ${name}="${v}". Allowed: ${allowed.join(", ")}`
    );
  }
  return hit;
}

export function requireNumber(name: string): number {
  const v = requireEnv(name);
  if (!/^-?\d+(\.\d+)?$/.test(v)) {
    throw new Error(`Env var ${name} must be a number, got "${v}"`);
  }
  return Number(v);
}

/** Comma-separated list; blanks dropped; at least one entry. */
export function requireList(name: string): string[] {
  const items = requireEnv(name)
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (items.length === 0) {
    throw new Error(`Env var ${name} must list at least one value`);
  }
  return items;
}
