import type { Logger } from 'pino';
import { z } from 'zod';
import { ChannelError } from '../../domain/index.js';
import type { TelemetryRecord } from '../../domain/index.js';
import type { IngestionStats } from '../../application/ingestion-stats.js';
import { sleep } from '../../application/sleep.js';
import type { Clock } from './bearer-token.js';
import type { CredentialProvider } from './credential-provider.js';
import { bearer, describeFailure, parseJsonBody, request } from './http.js';
import type { HttpResult } from './http.js';
import { encodeNdjson, telemetryRecordSchema } from './ndjson.js';

export type ChannelState = 'UNOPENED' | 'OPEN' | 'CLOSED';

/** Where a channel lives inside the warehouse. */
export interface ChannelTarget {
  database: string;
  schema: string;
  pipe: string;
}

export interface AppendResult {
  rowCount: number;
  byteCount: number;
  /** Offset committed by this call (unchanged for an empty batch). */
  offset: number;
}

export interface ChannelStatus {
  committed_offset_token?: number | undefined;
  [key: string]: unknown;
}

export interface WaitForCommitOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

const offsetTokenSchema = z.union([z.string(), z.number()]).nullish();

const openResponseSchema = z.object({
  next_continuation_token: z.string().min(1).optional(),
  channel_status: z
    .object({ last_committed_offset_token: offsetTokenSchema })
    .passthrough()
    .nullish(),
});

const appendResponseSchema = z.object({
  next_continuation_token: z.string().min(1),
});

const bulkStatusResponseSchema = z.object({
  channel_statuses: z
    .record(z.string(), z.object({ committed_offset_token: offsetTokenSchema }).passthrough())
    .default({}),
});

const pad = (n: number): string => String(n).padStart(2, '0');

/** `{base}_{YYYYMMDD_HHMMSS}` in local time, unique per process run. */
export function buildChannelName(base: string, at: Date): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `${base}_${date}_${time}`;
}

/**
 * Offset tokens are decimal integers, sent as strings on the wire.
 * Absent or null means nothing has been committed yet.
 */
export function parseOffsetToken(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new ChannelError(`Unrecognized offset token: ${String(value)}`);
  }
  return n;
}

/**
 * One append-only channel on a pipe, driven by a single writer.
 *
 * Lifecycle: UNOPENED → OPEN → CLOSED. The continuation token and offset
 * are only ever replaced after the service acknowledges a call, so a
 * failed append leaves the channel exactly as it was and the next append
 * reuses the same candidate offset.
 */
export class ChannelSession {
  readonly channelName: string;

  private currentState: ChannelState = 'UNOPENED';
  private token: string | undefined;
  private committedOffset = 0;
  private opening = false;
  private appending = false;

  constructor(
    private readonly target: ChannelTarget,
    baseChannelName: string,
    private readonly credentials: CredentialProvider,
    private readonly stats: IngestionStats,
    private readonly log: Logger,
    createdAt: Date = new Date(),
    private readonly now: Clock = Date.now,
  ) {
    this.channelName = buildChannelName(baseChannelName, createdAt);
  }

  get state(): ChannelState {
    return this.currentState;
  }

  get offset(): number {
    return this.committedOffset;
  }

  get continuationToken(): string | undefined {
    return this.token;
  }

  async open(): Promise<void> {
    if (this.currentState !== 'UNOPENED') {
      throw new ChannelError(`Cannot open channel ${this.channelName} in state ${this.currentState}`);
    }
    if (this.opening) {
      throw new ChannelError(`Open already in flight on channel ${this.channelName}`);
    }

    this.opening = true;
    try {
      await this.openChannel();
    } finally {
      this.opening = false;
    }
  }

  private async openChannel(): Promise<void> {
    this.log.info({ channel: this.channelName }, 'Opening channel');
    const res = await this.send('open', 'PUT', this.channelPath(), {
      headers: { 'Content-Type': 'application/json' },
      body: '{}',
    });

    const parsed = openResponseSchema.safeParse(parseJsonBody(res.body));
    if (!parsed.success || parsed.data.next_continuation_token === undefined) {
      throw new ChannelError('Open channel response has no continuation token', {
        status: res.status,
        body: res.body,
      });
    }

    const initialOffset =
      parseOffsetToken(parsed.data.channel_status?.last_committed_offset_token) ?? 0;

    if (this.currentState !== 'UNOPENED') {
      throw new ChannelError(`Channel ${this.channelName} was closed while opening`);
    }

    this.token = parsed.data.next_continuation_token;
    this.committedOffset = initialOffset;
    this.currentState = 'OPEN';

    this.log.info(
      { channel: this.channelName, offset: this.committedOffset },
      'Channel opened',
    );
  }

  /**
   * Appends one batch. The offset advances by one per batch regardless of
   * how many rows it carries.
   */
  async append(records: readonly TelemetryRecord[]): Promise<AppendResult> {
    const continuationToken = this.token;
    if (this.currentState !== 'OPEN' || continuationToken === undefined) {
      throw new ChannelError(
        `Channel ${this.channelName} is not open (state ${this.currentState})`,
      );
    }
    if (records.length === 0) {
      return { rowCount: 0, byteCount: 0, offset: this.committedOffset };
    }
    if (this.appending) {
      throw new ChannelError(`Append already in flight on channel ${this.channelName}`);
    }

    records.forEach((record, index) => {
      const check = telemetryRecordSchema.safeParse(record);
      if (!check.success) {
        throw new ChannelError(
          `Record ${index} is not a flat scalar row: ${check.error.issues[0]?.message ?? 'invalid'}`,
        );
      }
    });

    this.appending = true;
    try {
      const candidate = this.committedOffset + 1;
      const { payload, byteCount } = encodeNdjson(records);
      const query = new URLSearchParams({
        continuationToken,
        offsetToken: String(candidate),
      });

      this.log.debug(
        { channel: this.channelName, rows: records.length, offset: candidate },
        'Appending rows',
      );

      const res = await this.send('append', 'POST', `${this.rowsPath()}?${query.toString()}`, {
        headers: { 'Content-Type': 'application/x-ndjson' },
        body: payload,
      });

      const parsed = appendResponseSchema.safeParse(parseJsonBody(res.body));
      if (!parsed.success) {
        throw new ChannelError('Append response has no continuation token', {
          status: res.status,
          body: res.body,
        });
      }

      if (this.currentState !== 'OPEN') {
        throw new ChannelError(
          `Channel ${this.channelName} was closed while an append was in flight; batch not recorded`,
        );
      }

      // Commit point: nothing above this line mutates channel state.
      this.token = parsed.data.next_continuation_token;
      this.committedOffset = candidate;
      this.stats.recordBatch(records.length, byteCount);

      this.log.info(
        { channel: this.channelName, rows: records.length, bytes: byteCount, offset: candidate },
        'Rows appended',
      );
      return { rowCount: records.length, byteCount, offset: candidate };
    } finally {
      this.appending = false;
    }
  }

  async getStatus(): Promise<ChannelStatus> {
    if (this.currentState === 'UNOPENED') {
      throw new ChannelError(`Channel ${this.channelName} has not been opened`);
    }

    const res = await this.send('status', 'POST', `${this.pipePath()}:bulk-channel-status`, {
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ channel_names: [this.channelName] }),
    });

    const parsed = bulkStatusResponseSchema.safeParse(parseJsonBody(res.body));
    if (!parsed.success) {
      throw new ChannelError('Malformed bulk channel status response', {
        status: res.status,
        body: res.body,
      });
    }

    const status = parsed.data.channel_statuses[this.channelName];
    if (status === undefined) {
      return { committed_offset_token: undefined };
    }
    return {
      ...status,
      committed_offset_token: parseOffsetToken(status.committed_offset_token),
    };
  }

  /**
   * Polls channel status until the committed offset reaches `expectedOffset`.
   * Never throws: poll failures are logged and polling continues until the
   * timeout elapses or `signal` aborts.
   */
  async waitForCommit(expectedOffset: number, options: WaitForCommitOptions = {}): Promise<boolean> {
    const { timeoutMs = 60_000, pollIntervalMs = 2_000, signal } = options;
    const deadline = this.now() + timeoutMs;

    this.log.info({ channel: this.channelName, expectedOffset }, 'Waiting for commit');

    while (this.now() < deadline && !signal?.aborted) {
      try {
        const status = await this.getStatus();
        const committed = status.committed_offset_token ?? 0;
        if (committed >= expectedOffset) {
          this.log.info({ channel: this.channelName, committed }, 'Offset committed');
          return true;
        }
      } catch (err: unknown) {
        this.log.warn({ err, channel: this.channelName }, 'Channel status check failed');
      }
      await sleep(Math.min(pollIntervalMs, Math.max(0, deadline - this.now())), signal);
    }

    this.log.warn({ channel: this.channelName, expectedOffset, timeoutMs }, 'Commit wait timed out');
    return false;
  }

  /** Local bookkeeping only; the service closes idle channels itself. */
  close(): void {
    if (this.currentState === 'CLOSED') return;
    this.currentState = 'CLOSED';
    this.log.info(
      { channel: this.channelName, offset: this.committedOffset },
      'Channel closed locally; service will auto-close after inactivity',
    );
  }

  private pipePath(): string {
    const { database, schema, pipe } = this.target;
    return `/databases/${encodeURIComponent(database)}/schemas/${encodeURIComponent(schema)}/pipes/${encodeURIComponent(pipe)}`;
  }

  private channelPath(): string {
    return `${this.pipePath()}/channels/${encodeURIComponent(this.channelName)}`;
  }

  private rowsPath(): string {
    return `/data${this.channelPath()}/rows`;
  }

  /**
   * Sends one data-plane request with a fresh scoped token. Credential and
   * host failures propagate with their own error class; transport and
   * non-2xx failures become `ChannelError`. A 401 drops the cached scoped
   * token so the next call exchanges a new one.
   */
  private async send(
    operation: 'open' | 'append' | 'status',
    method: 'PUT' | 'POST',
    path: string,
    init: { headers: Record<string, string>; body: string },
  ): Promise<HttpResult> {
    const scopedToken = await this.credentials.getScopedToken();
    const host = await this.credentials.getIngestHost();
    const url = `https://${host}/v2/streaming${path}`;

    let res: HttpResult;
    try {
      res = await request(url, {
        method,
        headers: { ...bearer(scopedToken), ...init.headers },
        body: init.body,
      });
    } catch (err: unknown) {
      throw new ChannelError(
        `Channel ${operation} failed on ${this.channelName}: ${describeFailure(err)}`,
        { cause: err },
      );
    }

    if (!res.ok) {
      if (res.status === 401) this.credentials.invalidateScopedToken();
      this.log.error(
        { channel: this.channelName, operation, status: res.status, body: res.body },
        `Channel ${operation} failed`,
      );
      throw new ChannelError(`Channel ${operation} returned HTTP ${res.status}`, {
        status: res.status,
        body: res.body,
      });
    }
    return res;
  }
}
