export type MetricTags = Record<string, string>;

/**
 * Sumidero de contadores operativos.
 */
export interface IMetricsSink {
  increment(name: string, value?: number, tags?: MetricTags): void;

  /**
   * Copia de los contadores actuales, indexada por `name{tag=value,...}`.
   */
  snapshot(): Record<string, number>;
}
