/**
 * Opt-in Sentry reporting for unexpected store failures.
 *
 * Nothing leaves the process unless the host enables reporting, records consent and supplies a
 * DSN. Events are rebuilt with only the exception, the subsystem/operation tags and release
 * info; messages are redacted first. Each subsystem/operation/error-name combination is sent at
 * most once a minute.
 */

import { relative, sep } from "node:path";
import type * as SentryType from "@sentry/node";
import { consoleLogger, type TaskStoreLogger } from "../types/logger.js";
import { LOG_PREFIX } from "../utils/constants.js";

export interface ErrorReporterConfig {
  enabled: boolean;
  consent: boolean;
  dsn?: string;
  environment?: string;
  /** 0.0-1.0 */
  sampleRate: number;
}

export type StoreSubsystem = "tasks" | "vector" | "embeddings";

export type ErrorContext = {
  subsystem: StoreSubsystem;
  operation: string;
  severity?: "info" | "warning" | "error";
};

const REPORT_INTERVAL_MS = 60_000;
const MAX_MESSAGE_LENGTH = 400;

type Reporter = {
  sentry: typeof SentryType;
  lastSent: Map<string, number>;
};

let reporter: Reporter | null = null;

/** Secrets and personal data a store error message can carry. */
const REDACTIONS: ReadonlyArray<[RegExp, string]> = [
  // OpenAI keys, including sk-proj-… project keys
  [/\bsk-[A-Za-z0-9_-]{16,}/g, "[openai-key]"],
  [/\bBearer\s+\S+/gi, "Bearer [token]"],
  // DSN public key or user:password in any URL
  [/(\b[a-z][a-z0-9+.-]*:\/\/)[^\s/@]+@/gi, "$1[credentials]@"],
  [/\/(?:home|Users)\/[^/\s]+/g, "~"],
  [/[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g, "[email]"],
];

export function redact(text: string): string {
  let out = text;
  for (const [pattern, replacement] of REDACTIONS) out = out.replace(pattern, replacement);
  return out.length > MAX_MESSAGE_LENGTH ? `${out.slice(0, MAX_MESSAGE_LENGTH)}…` : out;
}

/** Stack frame path without the machine-specific prefix. */
export function framePath(path: string, root = process.cwd()): string {
  const modules = path.lastIndexOf(`node_modules${sep}`);
  if (modules >= 0) return path.slice(modules);
  const rel = relative(root, path);
  if (rel && !rel.startsWith("..")) return rel;
  return redact(path);
}

function frameOf(frame: SentryType.StackFrame): SentryType.StackFrame {
  return {
    filename: frame.filename === undefined ? undefined : framePath(frame.filename),
    function: frame.function,
    lineno: frame.lineno,
    colno: frame.colno,
    in_app: frame.in_app,
  };
}

function exceptionOf(ex: SentryType.Exception): SentryType.Exception {
  const frames = ex.stacktrace?.frames;
  return {
    type: ex.type,
    value: ex.value === undefined ? undefined : redact(ex.value),
    stacktrace: frames ? { frames: frames.map(frameOf) } : undefined,
  };
}

/** The event that is actually sent: everything not listed here is dropped. */
export function sanitizeEvent(event: SentryType.Event): SentryType.Event {
  const values = event.exception?.values;
  const tags: Record<string, string> = {};
  for (const key of ["subsystem", "operation"]) {
    const value = event.tags?.[key];
    if (value !== undefined && value !== null) tags[key] = redact(String(value));
  }
  return {
    event_id: event.event_id,
    timestamp: event.timestamp,
    level: event.level,
    platform: "node",
    release: event.release,
    environment: event.environment,
    exception: values ? { values: values.map(exceptionOf) } : undefined,
    tags,
  };
}

/**
 * Start reporting when the config opts in. Returns whether reporting is now active;
 * a missing DSN with reporting enabled is logged as a warning.
 */
export async function initErrorReporter(
  config: ErrorReporterConfig,
  release: string,
  logger: TaskStoreLogger = consoleLogger,
): Promise<boolean> {
  if (!config.enabled || !config.consent) return false;
  if (!config.dsn) {
    logger.warn(`${LOG_PREFIX} error reporting enabled but no DSN configured; reporting stays off`);
    return false;
  }

  const sentry = await import("@sentry/node");
  const environment = config.environment || "production";
  sentry.init({
    dsn: config.dsn,
    release: `semantic-task-store@${release}`,
    environment,
    sampleRate: config.sampleRate,
    sendDefaultPii: false,
    defaultIntegrations: false,
    maxBreadcrumbs: 10,
    beforeSend: (event) => sanitizeEvent(event),
    beforeBreadcrumb: (crumb) =>
      crumb.category?.startsWith("store.") ? { category: crumb.category, message: crumb.message, level: crumb.level } : null,
  });
  reporter = { sentry, lastSent: new Map() };
  logger.info(`${LOG_PREFIX} error reporting on (${environment})`);
  return true;
}

export function isErrorReporterActive(): boolean {
  return reporter !== null;
}

/** Normalize an unknown thrown value to an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Report a failure. Returns the event id, or undefined when reporting is off or throttled. */
export function captureStoreError(error: unknown, context: ErrorContext): string | undefined {
  if (!reporter) return undefined;
  const err = toError(error);
  const key = `${context.subsystem}/${context.operation}/${err.name}`;
  const now = Date.now();
  const last = reporter.lastSent.get(key);
  if (last !== undefined && now - last < REPORT_INTERVAL_MS) return undefined;
  reporter.lastSent.set(key, now);
  return reporter.sentry.captureException(err, {
    tags: { subsystem: context.subsystem, operation: context.operation },
    level: context.severity ?? "error",
  });
}

/** Record which store operation ran, for context on a later report. Operation names only. */
export function addOperationBreadcrumb(subsystem: StoreSubsystem, operation: string): void {
  reporter?.sentry.addBreadcrumb({ category: `store.${subsystem}`, message: operation, level: "info" });
}

/** Send queued reports; false when reporting is off or the timeout ran out. */
export async function flushErrorReporter(timeoutMs = 2000): Promise<boolean> {
  return reporter ? reporter.sentry.flush(timeoutMs) : false;
}
