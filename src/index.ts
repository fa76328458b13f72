import type { AmiClientConfigInput } from './ami/config';
import { env } from './env';
import { log } from './log';
import { buildServer } from './server';

function amiConfigFromEnv(): AmiClientConfigInput {
  return {
    host: env.AMI_HOST,
    port: env.AMI_PORT,
    username: env.AMI_USERNAME,
    secret: env.AMI_SECRET,
    actionTimeoutMs: env.AMI_ACTION_TIMEOUT_MS,
    reconnect: {
      baseDelayMs: env.AMI_RECONNECT_BASE_MS,
      maxDelayMs: env.AMI_RECONNECT_MAX_MS,
      maxAttempts: env.AMI_RECONNECT_MAX_ATTEMPTS,
    },
    keepalive: {
      idleMs: env.AMI_KEEPALIVE_IDLE_MS,
      graceMs: env.AMI_KEEPALIVE_GRACE_MS,
    },
    monitoredExtensions: env.AMI_MONITORED_EXTENSIONS,
    callGraceMs: env.CALL_GRACE_MS,
  };
}

const { server, client, wss } = buildServer({ statusToken: env.STATUS_TOKEN });

server.listen(env.PORT, () => {
  log.info({ port: env.PORT }, 'status server listening');
});

client.connect(amiConfigFromEnv()).catch((error: unknown) => {
  log.error({ err: error, event: 'pbx_client_connect_failed' }, 'pbx client could not connect');
  process.exitCode = 1;
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  log.info({ signal }, 'shutting down');
  await client.disconnect();
  wss.close();
  server.close();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ err: error }, 'shutdown failed');
      process.exitCode = 1;
    });
  });
}
