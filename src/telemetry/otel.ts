/**
 * OpenTelemetry infrastructure for the gateway.
 *
 * Provides the Prometheus exporter and the request, admission and batching
 * instruments. `MetricsRecorder` is the only thing request paths touch.
 *
 * @module telemetry/otel
 */

import { metrics, type Meter, type Counter, type Histogram } from '@opentelemetry/api';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { Logger } from 'pino';

/**
 * Configuration options for OpenTelemetry metrics.
 */
export interface TelemetryConfig {
  /**
   * Enable metrics collection (default: false).
   */
  enabled: boolean;
  /**
   * Service name for metrics (default: 'infergate').
   */
  serviceName?: string;
  /**
   * Prometheus exporter port (default: 9464).
   */
  prometheusPort?: number;
  logger?: Logger;
}

interface NormalizedTelemetryConfig {
  enabled: boolean;
  serviceName: string;
  prometheusPort: number;
  logger: Logger | undefined;
}

export interface GatewayMetrics {
  requestsTotal: Counter;
  requestLatency: Histogram;
  queueRejections: Counter;
  batchesTotal: Counter;
  batchFailures: Counter;
  batchSize: Histogram;
}

/**
 * Request outcome label for `infergate_requests_total`.
 */
/**
 * `invalid` covers client errors (unknown model, unsupported capability,
 * bad parameters); `error` is reserved for model and gateway failures.
 */
export type RequestStatus = 'success' | 'error' | 'invalid' | 'rejected' | 'cancelled';

/**
 * OpenTelemetry telemetry manager.
 *
 * @example
 * ```typescript
 * const telemetry = new TelemetryManager({ enabled: true, prometheusPort: 9464 });
 * await telemetry.start();
 * telemetry.metrics.requestsTotal.add(1, { model: 'hashing-384', status: 'success' });
 * await telemetry.shutdown();
 * ```
 */
export class TelemetryManager {
  private readonly config: NormalizedTelemetryConfig;
  private meterProvider: MeterProvider | null = null;
  private prometheusExporter: PrometheusExporter | null = null;
  private meter: Meter | null = null;
  private _metrics: GatewayMetrics | null = null;
  private started = false;

  constructor(config: TelemetryConfig) {
    this.config = {
      enabled: config.enabled,
      serviceName: config.serviceName || 'infergate',
      prometheusPort: config.prometheusPort ?? 9464,
      logger: config.logger,
    };
  }

  /**
   * Get the initialized metrics. Throws if not started.
   */
  public get metrics(): GatewayMetrics {
    if (!this._metrics) {
      throw new Error('TelemetryManager not started. Call start() first.');
    }
    return this._metrics;
  }

  public isEnabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Start the Prometheus exporter and register all instruments.
   *
   * @throws {Error} if telemetry is disabled.
   */
  public async start(): Promise<void> {
    if (!this.config.enabled) {
      throw new Error('Telemetry is disabled. Set enabled:true in config.');
    }

    if (this.started) {
      this.config.logger?.warn('TelemetryManager already started');
      return;
    }

    try {
      // The exporter is a pull reader serving /metrics on its own port;
      // its callback fires once the scrape server is listening.
      const exporter = await new Promise<PrometheusExporter>((resolve, reject) => {
        const created: PrometheusExporter = new PrometheusExporter(
          { port: this.config.prometheusPort },
          (error) => (error ? reject(error) : resolve(created))
        );
      });
      this.prometheusExporter = exporter;

      this.meterProvider = new MeterProvider({
        readers: [exporter],
      });

      metrics.setGlobalMeterProvider(this.meterProvider);
      // Taken from our own provider: the global one may belong to an earlier start().
      this.meter = this.meterProvider.getMeter(this.config.serviceName, '0.1.0');
      this._metrics = this.createMetrics(this.meter);
      this.started = true;

      this.config.logger?.info(
        {
          serviceName: this.config.serviceName,
          endpoint: `http://localhost:${this.config.prometheusPort}/metrics`,
        },
        'Prometheus metrics available'
      );
    } catch (error) {
      this.config.logger?.error({ error }, 'Failed to start telemetry');
      throw error;
    }
  }

  /**
   * Shutdown the telemetry manager and flush all metrics.
   */
  public async shutdown(): Promise<void> {
    if (!this.started) {
      return;
    }

    try {
      // Shuts down the exporter (and its HTTP server) as a registered reader.
      await this.meterProvider?.shutdown();
      metrics.disable();

      this.started = false;
      this._metrics = null;
      this.meter = null;
      this.meterProvider = null;
      this.prometheusExporter = null;

      this.config.logger?.info('OpenTelemetry metrics shut down');
    } catch (error) {
      this.config.logger?.error({ error }, 'Failed to shutdown telemetry');
      throw error;
    }
  }

  public isStarted(): boolean {
    return this.started;
  }

  private createMetrics(meter: Meter): GatewayMetrics {
    return {
      requestsTotal: meter.createCounter('infergate_requests_total', {
        description: 'Total number of inference requests by model and outcome',
        unit: '1',
      }),
      requestLatency: meter.createHistogram('infergate_request_latency_ms', {
        description: 'End-to-end request latency including queueing',
        unit: 'ms',
      }),
      queueRejections: meter.createCounter('infergate_queue_rejections_total', {
        description: 'Requests rejected by admission control',
        unit: '1',
      }),
      batchesTotal: meter.createCounter('infergate_batches_total', {
        description: 'Total number of dispatched batches',
        unit: '1',
      }),
      batchFailures: meter.createCounter('infergate_batch_failures_total', {
        description: 'Total number of failed batches',
        unit: '1',
      }),
      batchSize: meter.createHistogram('infergate_batch_size', {
        description: 'Sub-items per dispatched batch',
        unit: '1',
      }),
    };
  }
}

/**
 * Fire-and-forget facade over TelemetryManager.
 *
 * Metrics must never fail a request: every call is a no-op while telemetry
 * is not started, and instrument errors are logged and dropped.
 */
export class MetricsRecorder {
  private readonly telemetry?: TelemetryManager;
  private readonly logger?: Logger;

  constructor(telemetry?: TelemetryManager, logger?: Logger) {
    this.telemetry = telemetry;
    this.logger = logger;
  }

  public recordRequest(model: string, status: RequestStatus, latencyMs: number): void {
    this.guard('recordRequest', (m) => {
      m.requestsTotal.add(1, { model, status });
      m.requestLatency.record(latencyMs, { model });
    });
  }

  public recordQueueRejection(model: string, reason: 'full' | 'timeout' | 'shutting_down'): void {
    this.guard('recordQueueRejection', (m) => {
      m.queueRejections.add(1, { model, reason });
    });
  }

  public recordBatch(model: string, size: number, failed: boolean): void {
    this.guard('recordBatch', (m) => {
      m.batchesTotal.add(1, { model });
      m.batchSize.record(size, { model });
      if (failed) {
        m.batchFailures.add(1, { model });
      }
    });
  }

  private guard(operation: string, record: (m: GatewayMetrics) => void): void {
    if (!this.telemetry?.isStarted()) {
      return;
    }
    try {
      record(this.telemetry.metrics);
    } catch (error) {
      this.logger?.debug({ error, operation }, 'Metrics recording failed');
    }
  }
}
