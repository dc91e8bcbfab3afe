import { Kafka, type Producer } from "kafkajs";
import type { SiemEvent } from "../audit/types";
import type { MetricsSink } from "./sink";

export type KafkaSinkConfig = {
  clientId: string;
  brokers: string[];
  topic: string;
};

export class KafkaMetricsSink implements MetricsSink {
  private readonly producer: Producer;
  private connected: Promise<void> | null = null;

  constructor(private readonly sinkConfig: KafkaSinkConfig) {
    const kafka = new Kafka({ clientId: sinkConfig.clientId, brokers: sinkConfig.brokers });
    this.producer = kafka.producer();
  }

  private connect(): Promise<void> {
    if (!this.connected) {
      this.connected = this.producer.connect().catch((error: unknown) => {
        this.connected = null;
        throw error;
      });
    }
    return this.connected;
  }

  async publish(events: SiemEvent[]): Promise<void> {
    if (!events.length) {
      return;
    }
    await this.connect();
    await this.producer.send({
      topic: this.sinkConfig.topic,
      messages: events.map((event) => ({
        key: event.siem_event_id,
        value: JSON.stringify(event),
        headers: {
          "event-type": event.event_type,
          ...(event.metadata.trace_id ? { "x-trace-id": event.metadata.trace_id } : {})
        }
      }))
    });
  }

  async close(): Promise<void> {
    if (this.connected) {
      this.connected = null;
      await this.producer.disconnect();
    }
  }
}
