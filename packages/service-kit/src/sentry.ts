import { Logger } from "@nestjs/common";
import * as Sentry from "@sentry/node";

const FLUSH_TIMEOUT_MS = 2000;

export function initSentry(serverName: string): void {
  const dsn = process.env.SENTRY_DSN_BACKEND;
  if (!dsn) return;
  Sentry.init({
    dsn,
    environment: process.env.APP_ENV || process.env.NODE_ENV || "local",
    tracesSampleRate: 0.2,
    release: process.env.RELEASE_SHA || "local",
    serverName,
  });
}

/** Logs and reports a failed bootstrap, waits for Sentry to drain, then exits with 1. */
export async function exitOnBootstrapFailure(
  err: unknown,
  exit: (code: number) => void = (code) => process.exit(code),
): Promise<void> {
  new Logger("Bootstrap").error(err instanceof Error ? err.stack || err.message : String(err));
  Sentry.captureException(err);
  await Sentry.flush(FLUSH_TIMEOUT_MS);
  exit(1);
}
