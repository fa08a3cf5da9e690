import { Injectable } from '@nestjs/common';

import { IMetricsSink, MetricTags } from '../interfaces/metrics-sink.interface';

/**
 * Contadores en memoria del proceso. Se exponen en GET /health.
 */
@Injectable()
export class InMemoryMetricsSink implements IMetricsSink {
  private readonly counters = new Map<string, number>();

  increment(name: string, value: number = 1, tags?: MetricTags): void {
    const key = this.keyFor(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counters.entries());
  }

  private keyFor(name: string, tags?: MetricTags): string {
    if (!tags || Object.keys(tags).length === 0) {
      return name;
    }

    const rendered = Object.keys(tags)
      .sort()
      .map((tag) => `${tag}=${tags[tag]}`)
      .join(',');

    return `${name}{${rendered}}`;
  }
}
