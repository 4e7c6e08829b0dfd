import { NodeSDK, resources, tracing } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { SEMRESATTRS_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import { config } from "./config";

const sdk = new NodeSDK({
  resource: new resources.Resource({
    [SEMRESATTRS_SERVICE_NAME]: config.serviceName
  }),
  spanProcessor: new tracing.SimpleSpanProcessor(new tracing.ConsoleSpanExporter()),
  instrumentations: [getNodeAutoInstrumentations()]
});

export async function startTelemetry(): Promise<void> {
  await sdk.start();
}

export async function stopTelemetry(): Promise<void> {
  await sdk.shutdown();
}
