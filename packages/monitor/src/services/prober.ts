import { spawn } from 'child_process';
import { lookup } from 'dns/promises';
import { EventEmitter } from 'events';
import { FailureKind, ProbeOutcome, ReplyDetails, probeFailed, probeSucceeded } from '@pingwatch/shared';

const DEFAULT_TIMEOUT_MS = 30_000;
// extra time the ping binary gets to report before it is killed
const KILL_GRACE_MS = 5_000;
const UNRESOLVABLE_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME', 'EAI_FAIL']);

export interface Prober {
  probe(host: string): Promise<ProbeOutcome>;
}

export interface PingProcess extends EventEmitter {
  stdout: EventEmitter | null;
  stderr: EventEmitter | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnPing = (command: string, args: string[]) => PingProcess;
export type ResolveHost = (host: string) => Promise<unknown>;

export interface IcmpProberOptions {
  binary?: string;
  timeoutMs?: number;
  count?: number;
  spawnPing?: SpawnPing;
  resolveHost?: ResolveHost;
  now?: () => Date;
}

const defaultSpawn: SpawnPing = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

const defaultResolve: ResolveHost = host => lookup(host);

/**
 * Round-trip time of the first reply in `ping` output, in milliseconds.
 */
export function parsePingOutput(text: string): number | undefined {
  const match = text.match(/time[=<]\s*([0-9]+(?:\.[0-9]+)?)\s*(ms|µs|μs|us)\b/i);
  if (!match) {
    return undefined;
  }

  const value = Number(match[1]);
  if (!Number.isFinite(value)) {
    return undefined;
  }

  const unit = match[2].toLowerCase();
  return unit === 'ms' ? value : Number((value / 1000).toFixed(3));
}

/**
 * Responder, size, sequence number and TTL from the first reply line, e.g.
 * `64 bytes from 192.0.2.10: icmp_seq=1 ttl=57 time=31.4 ms`.
 */
export function parseReplyDetails(text: string): ReplyDetails | undefined {
  const line = text.split(/\r?\n/).find(candidate => /bytes from /i.test(candidate));
  const match = line?.match(/(\d+) bytes from (\S+?):?\s/i);
  if (!line || !match) {
    return undefined;
  }

  const sequence = line.match(/icmp_seq=(\d+)/i);
  const ttl = line.match(/ttl=(\d+)/i);

  return {
    from: match[2],
    bytes: Number(match[1]),
    ...(sequence ? { sequence: Number(sequence[1]) } : {}),
    ...(ttl ? { ttl: Number(ttl[1]) } : {})
  };
}

function isUnresolvable(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  return typeof code === 'string' && UNRESOLVABLE_CODES.has(code);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function buildPingArgs(host: string, count: number, timeoutMs: number): string[] {
  const waitSeconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  return ['-n', '-c', String(count), '-W', String(waitSeconds), host];
}

/**
 * Probes a host with the system `ping` binary. Resolves the host first so a
 * name that cannot be resolved is reported apart from a timeout; the lookup
 * and the ping share one timeout budget. Never rejects: every failure becomes
 * a failed outcome.
 */
export class IcmpProber implements Prober {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly count: number;
  private readonly spawnPing: SpawnPing;
  private readonly resolveHost: ResolveHost;
  private readonly now: () => Date;

  constructor(options: IcmpProberOptions = {}) {
    this.binary = options.binary ?? 'ping';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.count = options.count ?? 1;
    this.spawnPing = options.spawnPing ?? defaultSpawn;
    this.resolveHost = options.resolveHost ?? defaultResolve;
    this.now = options.now ?? (() => new Date());
  }

  probe(host: string): Promise<ProbeOutcome> {
    const sentAt = this.now();

    return new Promise<ProbeOutcome>(resolve => {
      let child: PingProcess | undefined;
      let settled = false;

      const settle = (outcome: ProbeOutcome) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        resolve(outcome);
      };

      const timeout = setTimeout(() => {
        if (child) {
          child.kill('SIGTERM');
          settle(probeFailed(sentAt, FailureKind.TIMEOUT, `${this.binary} timed out after ${this.timeoutMs}ms`));
        } else {
          settle(probeFailed(sentAt, FailureKind.TIMEOUT, `Lookup of ${host} timed out after ${this.timeoutMs}ms`));
        }
      }, this.timeoutMs + KILL_GRACE_MS);

      void this.resolveHost(host).then(
        () => {
          if (!settled) {
            child = this.startPing(host, sentAt, settle);
          }
        },
        error => {
          settle(probeFailed(
            sentAt,
            isUnresolvable(error) ? FailureKind.UNRESOLVABLE : FailureKind.OTHER,
            describeError(error)
          ));
        }
      );
    });
  }

  private startPing(host: string, sentAt: Date, settle: (outcome: ProbeOutcome) => void): PingProcess | undefined {
    const args = buildPingArgs(host, this.count, this.timeoutMs);

    let child: PingProcess;
    try {
      child = this.spawnPing(this.binary, args);
    } catch (error) {
      settle(probeFailed(sentAt, FailureKind.OTHER, describeError(error)));
      return undefined;
    }

    let stdout = '';
    let stderr = '';

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString('utf8');
    });

    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf8');
    });

    child.on('error', (error: Error) => {
      settle(probeFailed(sentAt, FailureKind.OTHER, error.message));
    });

    child.on('close', (code: number | null) => {
      const latencyMs = parsePingOutput(stdout);

      if (code === 0 && latencyMs !== undefined) {
        settle(probeSucceeded(sentAt, latencyMs, parseReplyDetails(stdout)));
      } else if (code === 1 || (code === 0 && latencyMs === undefined)) {
        settle(probeFailed(sentAt, FailureKind.TIMEOUT, 'No reply received'));
      } else if (/unknown host|not known|cannot resolve/i.test(stderr)) {
        settle(probeFailed(sentAt, FailureKind.UNRESOLVABLE, stderr.trim()));
      } else {
        const reason = stderr.trim() || `${this.binary} exited with code ${code === null ? 'unknown' : code}`;
        settle(probeFailed(sentAt, FailureKind.OTHER, reason));
      }
    });

    return child;
  }
}
