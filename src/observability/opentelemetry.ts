import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { NodeSDK } from '@opentelemetry/sdk-node';

import { getEnv } from '../config/env';
import { logger } from '../config/logger';

export interface ObservabilityController {
  shutdown(): Promise<void>;
  isEnabled: boolean;
}

let activeSdk: NodeSDK | null = null;

function normalizeEndpoint(endpoint: string): string {
  return `${endpoint.replace(/\/$/, '')}/v1/traces`;
}

async function shutdownActiveSdk(): Promise<void> {
  if (!activeSdk) {
    return;
  }

  try {
    await activeSdk.shutdown();
    logger.info('OpenTelemetry instrumentation shutdown complete');
  } finally {
    activeSdk = null;
  }
}

export async function startObservability(): Promise<ObservabilityController> {
  const env = getEnv();

  if (env.OTEL_ENABLED !== 'true') {
    logger.info('OpenTelemetry disabled');
    return {
      isEnabled: false,
      async shutdown() {
        // noop
      },
    };
  }

  if (activeSdk) {
    return { isEnabled: true, shutdown: shutdownActiveSdk };
  }

  diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);

  const sdk = new NodeSDK({
    serviceName: env.OTEL_SERVICE_NAME,
    traceExporter: new OTLPTraceExporter({ url: normalizeEndpoint(env.OTEL_EXPORTER_OTLP_ENDPOINT) }),
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-http': {
          ignoreIncomingRequestHook(request) {
            return request.url?.startsWith('/health') ?? false;
          },
        },
      }),
    ],
  });

  try {
    sdk.start();
    activeSdk = sdk;
    logger.info('OpenTelemetry instrumentation initialised');
  } catch (error) {
    logger.error({ err: error }, 'failed to start OpenTelemetry SDK');
    throw error;
  }

  return { isEnabled: true, shutdown: shutdownActiveSdk };
}
