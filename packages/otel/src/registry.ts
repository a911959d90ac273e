/**
 * InstrumentRegistry — named instruments over one MeterProvider.
 *
 * A name maps to exactly one instrument kind. Asking for the same name and
 * kind again returns the existing handle; asking for another kind throws.
 */

import type {
  Counter,
  Histogram,
  Meter,
  MeterProvider,
  MetricOptions,
  ObservableCallback,
  ObservableGauge,
  UpDownCounter,
} from "@opentelemetry/api";
import { InstrumentConflictError } from "@telex/errors";

export type InstrumentKind = "counter" | "upDownCounter" | "histogram" | "observableGauge";

export interface HistogramOptions extends MetricOptions {
  /** Explicit bucket boundaries, ascending */
  readonly boundaries?: readonly number[];
}

export interface InstrumentInfo {
  readonly name: string;
  readonly kind: InstrumentKind;
}

export class InstrumentRegistry {
  private readonly _meterProvider: MeterProvider;
  private readonly _meter: Meter;
  private readonly _kinds = new Map<string, InstrumentKind>();
  private readonly _counters = new Map<string, Counter>();
  private readonly _upDownCounters = new Map<string, UpDownCounter>();
  private readonly _histograms = new Map<string, Histogram>();
  private readonly _gauges = new Map<string, ObservableGauge>();

  constructor(meterProvider: MeterProvider, defaultMeterName: string) {
    this._meterProvider = meterProvider;
    this._meter = meterProvider.getMeter(defaultMeterName);
  }

  counter(name: string, options?: MetricOptions): Counter {
    return this._register(name, "counter", this._counters, () =>
      this._meter.createCounter(name, options),
    );
  }

  upDownCounter(name: string, options?: MetricOptions): UpDownCounter {
    return this._register(name, "upDownCounter", this._upDownCounters, () =>
      this._meter.createUpDownCounter(name, options),
    );
  }

  histogram(name: string, options: HistogramOptions = {}): Histogram {
    const { boundaries, ...metricOptions } = options;
    return this._register(name, "histogram", this._histograms, () =>
      this._meter.createHistogram(name, {
        ...metricOptions,
        ...(boundaries !== undefined
          ? { advice: { explicitBucketBoundaries: [...boundaries] } }
          : {}),
      }),
    );
  }

  /**
   * Register an observable gauge. `callback` runs whenever a snapshot is
   * taken. Registering an existing gauge again adds the callback to it.
   */
  observableGauge(
    name: string,
    callback: ObservableCallback,
    options?: MetricOptions,
  ): ObservableGauge {
    const gauge = this._register(name, "observableGauge", this._gauges, () =>
      this._meter.createObservableGauge(name, options),
    );
    gauge.addCallback(callback);
    return gauge;
  }

  /**
   * Raw meter for call sites that create their own instruments.
   * Defaults to the registry's meter.
   */
  getMeter(name?: string): Meter {
    return name === undefined ? this._meter : this._meterProvider.getMeter(name);
  }

  instruments(): readonly InstrumentInfo[] {
    return [...this._kinds].map(([name, kind]) => ({ name, kind }));
  }

  private _register<T>(
    name: string,
    kind: InstrumentKind,
    store: Map<string, T>,
    create: () => T,
  ): T {
    const existingKind = this._kinds.get(name);
    if (existingKind !== undefined && existingKind !== kind) {
      throw new InstrumentConflictError(name, existingKind, kind);
    }
    const found = store.get(name);
    if (found !== undefined) return found;

    const created = create();
    store.set(name, created);
    this._kinds.set(name, kind);
    return created;
  }
}
