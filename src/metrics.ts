import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';
import type { ConnectionState } from './ami/types';
import type { CallTransition } from './calls/types';

/**
 * Runtime Prometheus metrics
 *
 * Durations named *_ms are recorded in milliseconds, not the seconds
 * prom-client timers produce.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'pbx_call_monitor_';

const CONNECTION_STATES: readonly ConnectionState[] = [
  'DISCONNECTED',
  'CONNECTING',
  'AUTHENTICATING',
  'CONNECTED',
  'RECONNECTING',
];

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (status API)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
  registers: [register],
});

const connectionStateGauge = new client.Gauge({
  name: `${METRICS_PREFIX}ami_connection_state`,
  help: 'Current AMI connection state (1 for the active state)',
  labelNames: ['state'] as const,
  registers: [register],
});

const reconnectAttemptsTotal = new client.Counter({
  name: `${METRICS_PREFIX}ami_reconnect_attempts_total`,
  help: 'Reconnect attempts scheduled after network failures',
  registers: [register],
});

const actionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}ami_actions_total`,
  help: 'AMI actions by outcome',
  labelNames: ['action', 'outcome'] as const,
  registers: [register],
});

const actionDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}ami_action_duration_ms`,
  help: 'Time from sending an AMI action to its response, in milliseconds',
  labelNames: ['action'] as const,
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
  registers: [register],
});

const eventsTotal = new client.Counter({
  name: `${METRICS_PREFIX}ami_events_total`,
  help: 'AMI events received',
  labelNames: ['event'] as const,
  registers: [register],
});

const protocolErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}ami_protocol_errors_total`,
  help: 'Blocks skipped at the framer/parser boundary',
  labelNames: ['kind'] as const,
  registers: [register],
});

const callTransitionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_transitions_total`,
  help: 'Call lifecycle transitions emitted',
  labelNames: ['transition'] as const,
  registers: [register],
});

const activeCallsGauge = new client.Gauge({
  name: `${METRICS_PREFIX}active_calls`,
  help: 'Calls currently ringing or answered on monitored extensions',
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration from first ring to end, in seconds',
  labelNames: ['end_cause'] as const,
  buckets: [5, 10, 30, 60, 120, 300, 900, 1800],
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return `${req.baseUrl}${routePath}`;
  }
  return 'unmatched';
}

// ---------- exports used by server ----------

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

// ---------- ami ----------

export function setConnectionState(state: ConnectionState): void {
  for (const candidate of CONNECTION_STATES) {
    connectionStateGauge.set({ state: candidate }, candidate === state ? 1 : 0);
  }
}

export function incReconnectAttempts(): void {
  reconnectAttemptsTotal.inc();
}

/**
 * Starts an action timer; call the returned function with the outcome once
 * the action settles.
 */
export function startActionTimer(action: string): (outcome: string) => void {
  const start = nowNs();
  const label = action.toLowerCase();
  return (outcome) => {
    actionsTotal.inc({ action: label, outcome });
    actionDurationMs.observe({ action: label }, nsToMs(nowNs() - start));
  };
}

export function incEvent(event: string | undefined): void {
  eventsTotal.inc({ event: event && event.trim() !== '' ? event : 'unknown' });
}

export function incProtocolError(kind: string): void {
  protocolErrorsTotal.inc({ kind });
}

// ---------- calls ----------

export function incCallTransition(transition: CallTransition): void {
  callTransitionsTotal.inc({ transition });
}

export function setActiveCalls(count: number): void {
  activeCallsGauge.set(count);
}

export function observeCallDuration(endCause: string, durationMs: number): void {
  callDurationSeconds.observe({ end_cause: endCause }, durationMs / 1000);
}
