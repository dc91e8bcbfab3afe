import type { SiemEvent } from "../audit/types";

/** Downstream consumer of SIEM events, outside the durable audit path. */
export type MetricsSink = {
  publish: (events: SiemEvent[]) => Promise<void>;
  close?: () => Promise<void>;
};

export class NoopMetricsSink implements MetricsSink {
  async publish(): Promise<void> {
    return;
  }
}

export class InMemoryMetricsSink implements MetricsSink {
  readonly published: SiemEvent[] = [];

  async publish(events: SiemEvent[]): Promise<void> {
    this.published.push(...events);
  }
}
