import { config as loadDotEnv } from "dotenv";

let loaded = false;

export function ensureEnvLoaded(): void {
  if (loaded) {
    return;
  }

  loadDotEnv({ path: ".env.local" });
  loadDotEnv();
  loaded = true;
}

export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[name];

  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return value;
}

export function readNumberEnv(name: string, fallback: number, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[name];

  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}
