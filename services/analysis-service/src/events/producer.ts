import { Kafka, type Producer } from "kafkajs";
import { config } from "../config";

let producer: Producer | null = null;

export function getProducer(): Producer {
  if (!producer) {
    const kafka = new Kafka({ clientId: config.serviceName, brokers: config.brokerBrokers });
    producer = kafka.producer();
  }
  return producer;
}

export async function startProducer(): Promise<void> {
  await getProducer().connect();
}

export async function stopProducer(): Promise<void> {
  if (producer) {
    await producer.disconnect();
    producer = null;
  }
}
