import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { Resource } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { ConsoleSpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { SEMRESATTRS_SERVICE_NAME, SEMRESATTRS_SERVICE_NAMESPACE } from "@opentelemetry/semantic-conventions";
import { config } from "./config";
import { logger } from "./logger";

let sdk: NodeSDK | null = null;

/** Starts tracing for the HTTP service; the CLI never loads this module. */
export async function startTelemetry(): Promise<void> {
  if (!config.telemetry.enabled || sdk) {
    return;
  }
  sdk = new NodeSDK({
    resource: new Resource({
      [SEMRESATTRS_SERVICE_NAME]: config.serviceName,
      [SEMRESATTRS_SERVICE_NAMESPACE]: "agent-governance"
    }),
    spanProcessor: config.telemetry.consoleSpans ? new SimpleSpanProcessor(new ConsoleSpanExporter()) : undefined,
    // fs spans would wrap every policy and threat-model read.
    instrumentations: [getNodeAutoInstrumentations({ "@opentelemetry/instrumentation-fs": { enabled: false } })]
  });
  await sdk.start();
  logger.info({ traceId: "system", consoleSpans: config.telemetry.consoleSpans }, "Telemetry started");
}

export async function stopTelemetry(): Promise<void> {
  if (!sdk) {
    return;
  }
  const current = sdk;
  sdk = null;
  await current.shutdown();
}
