import type { ColumnRole, ReportSource } from "./types";

export type ReconcileErrorStatus = "missing_column" | "read_failed" | "invalid_config";

export abstract class ReconcileError extends Error {
  abstract readonly status: ReconcileErrorStatus;
}

export type MissingColumnMeta = {
  source: ReportSource;
  role: ColumnRole;
  keywords: string[];
  headers: string[];
};

export class MissingColumnError extends ReconcileError {
  readonly status = "missing_column" as const;
  readonly source: ReportSource;
  readonly role: ColumnRole;
  readonly keywords: string[];
  readonly headers: string[];

  constructor(meta: MissingColumnMeta) {
    const searched = meta.headers.length ? meta.headers.join(" | ") : "(no headers)";
    super(
      `${meta.source} report: no ${meta.role} column matching ${meta.keywords
        .map((kw) => `"${kw}"`)
        .join(", ")}. Headers searched: ${searched}`
    );
    this.name = "MissingColumnError";
    this.source = meta.source;
    this.role = meta.role;
    this.keywords = meta.keywords;
    this.headers = meta.headers;
  }
}

export class ReportReadError extends ReconcileError {
  readonly status = "read_failed" as const;
  readonly source: ReportSource;
  readonly path: string | null;

  constructor(meta: { source: ReportSource; path: string | null; cause?: unknown }) {
    const reason = meta.cause instanceof Error ? meta.cause.message : String(meta.cause ?? "");
    super(
      `Failed reading ${meta.source} report${meta.path ? ` ${meta.path}` : ""}${
        reason ? `: ${reason}` : ""
      }`
    );
    this.name = "ReportReadError";
    this.source = meta.source;
    this.path = meta.path;
  }
}

export class ConfigError extends ReconcileError {
  readonly status = "invalid_config" as const;
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid ${key}: ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}
