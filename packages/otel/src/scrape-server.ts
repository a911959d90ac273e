/**
 * Pull-based scrape endpoint.
 *
 * ScrapeReader is a cumulative MetricReader over the shared MeterProvider;
 * ScrapeServer answers `GET /metrics` with its snapshot in the Prometheus
 * text format. Every request takes its own snapshot.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { MetricReader } from "@opentelemetry/sdk-metrics";
import { EXPOSITION_CONTENT_TYPE, renderExposition } from "@telex/exposition";
import { getErrorMessage, ListenerBindError, ScrapeRenderError, toError } from "@telex/errors";
import { DEFAULT_SCRAPE_HOST, LIBRARY_MODULE, SCRAPE_PATH } from "./constants.js";
import { createLogger, type Logger } from "./logger.js";
import { temporalitySelectorFor } from "./targets.js";

export class ScrapeReader extends MetricReader {
  constructor() {
    super({ aggregationTemporalitySelector: temporalitySelectorFor("cumulative") });
  }

  /**
   * Take a snapshot and render it. Partial collection errors and metrics
   * the text format cannot carry are returned as problems alongside the body.
   *
   * @throws when no snapshot can be taken at all
   */
  async render(): Promise<{ body: string; problems: string[] }> {
    const { resourceMetrics, errors } = await this.collect();
    const problems = errors.map(getErrorMessage);
    const body = renderExposition(resourceMetrics, (problem) => problems.push(problem));
    return { body, problems };
  }

  protected async onForceFlush(): Promise<void> {}

  protected async onShutdown(): Promise<void> {}
}

export interface ScrapeServerOptions {
  readonly reader: ScrapeReader;
  /** 0 binds an ephemeral port */
  readonly port: number;
  readonly host?: string;
  readonly logger?: Logger;
}

export class ScrapeServer {
  private readonly _reader: ScrapeReader;
  private readonly _requestedPort: number;
  private readonly _host: string;
  private readonly _logger: Logger;
  private _server: Server | undefined;
  private _port: number | undefined;

  constructor(options: ScrapeServerOptions) {
    this._reader = options.reader;
    this._requestedPort = options.port;
    this._host = options.host ?? DEFAULT_SCRAPE_HOST;
    this._logger = options.logger ?? createLogger(LIBRARY_MODULE);
  }

  /** Bound port, once listening */
  get port(): number | undefined {
    return this._port;
  }

  /**
   * Bind and start listening.
   *
   * @returns the bound port
   * @throws {ListenerBindError} when the port cannot be bound
   */
  async start(): Promise<number> {
    if (this._server !== undefined && this._port !== undefined) return this._port;

    const server = createServer((req, res) => {
      void this._handle(req, res);
    });

    const port = await new Promise<number>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(new ListenerBindError(this._requestedPort, error));
      };
      server.once("error", onError);
      server.listen(this._requestedPort, this._host, () => {
        server.off("error", onError);
        const address = server.address();
        resolve(typeof address === "object" && address !== null ? address.port : this._requestedPort);
      });
    });

    server.on("error", (error) => {
      this._logger.error("scrape listener error", { error: error.message });
    });

    this._server = server;
    this._port = port;
    this._logger.info(`serving metrics on ${this._host}:${port}${SCRAPE_PATH}`);
    return port;
  }

  /**
   * Stop listening and drop open connections so the port can be bound again.
   */
  async stop(): Promise<void> {
    const server = this._server;
    if (server === undefined) return;
    this._server = undefined;
    this._port = undefined;

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  private async _handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

    if (pathname !== SCRAPE_PATH) {
      res.writeHead(404, { "Content-Type": "text/plain; charset=utf-8" });
      res.end("Not Found\n");
      return;
    }

    if (req.method !== "GET") {
      res.writeHead(405, { "Content-Type": "text/plain; charset=utf-8", Allow: "GET" });
      res.end("Method Not Allowed\n");
      return;
    }

    try {
      const { body, problems } = await this._reader.render();
      for (const problem of problems) {
        this._logger.warn("incomplete metrics scrape", { problem });
      }
      res.writeHead(200, { "Content-Type": EXPOSITION_CONTENT_TYPE });
      res.end(body);
    } catch (error: unknown) {
      const failure = new ScrapeRenderError(toError(error));
      this._logger.error(failure.message);
      res.writeHead(500, { "Content-Type": "text/plain; charset=utf-8" });
      res.end(`${failure.message}\n`);
    }
  }
}
