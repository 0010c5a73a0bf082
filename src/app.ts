import path from "path";
import type { Server as HttpServer } from "http";
import { fileURLToPath } from "url";
import type * as grpc from "@grpc/grpc-js";
import { ConfigurationError, errorMessage } from "./domain/errors.js";
import { PropagationMetricsTracker } from "./domain/metrics/propagationMetrics.js";
import type { CallStage } from "./domain/pipeline.js";
import type { Logger } from "./domain/types.js";
import { BearerTokenAuthenticator, createAuthenticationStage, type Authenticator } from "./domain/usecases/authenticate.js";
import { HeaderToTrailerMiddleware } from "./domain/usecases/headerToTrailer.js";
import { getUserInfo, watchUserInfo } from "./domain/usecases/userInfo.js";
import { loadConfig, type AppConfig } from "./infrastructure/config.js";
import { createGrpcServer, listen, shutdown } from "./infrastructure/grpcServer.js";
import { createLogger } from "./infrastructure/logger.js";
import { loadService } from "./infrastructure/protoLoader.js";
import { createAdminApp } from "./interfaces/httpAdmin.js";

export const SERVICE_NAME = "auth.AuthService";

export interface AppDeps {
  logger: Logger;
  /** Defaults to the bearer-token demo authenticator */
  authenticator?: Authenticator;
}

export interface App {
  middleware: HeaderToTrailerMiddleware;
  metrics: PropagationMetricsTracker;
  grpcServer: grpc.Server;
  /** Binds gRPC (and HTTP admin unless disabled); resolves with the bound gRPC port. */
  start(options?: { admin?: boolean }): Promise<number>;
  stop(): Promise<void>;
}

/**
 * Wires the pipeline: header-to-trailer middleware outermost, then
 * authentication, then the service handlers.
 *
 * @throws ConfigurationError when the propagation rule is invalid
 */
export function createApp(config: AppConfig, deps: AppDeps): App {
  const { logger } = deps;
  const middleware = new HeaderToTrailerMiddleware(config.propagation, { debug: logger.debug });
  const authenticator = deps.authenticator ?? new BearerTokenAuthenticator(config.authRealm);
  const metrics = new PropagationMetricsTracker();
  const stages: CallStage[] = [middleware.asStage(), createAuthenticationStage(authenticator)];

  const service = loadService(config.protoPath, SERVICE_NAME);
  const grpcServer = createGrpcServer(
    SERVICE_NAME,
    service.definition,
    { GetUserInfo: getUserInfo, WatchUserInfo: watchUserInfo },
    { stages, logger, metrics }
  );

  let httpServer: HttpServer | null = null;
  let grpcPort = config.grpcPort;

  return {
    middleware,
    metrics,
    grpcServer,

    async start(options = {}) {
      grpcPort = await listen(grpcServer, `0.0.0.0:${config.grpcPort}`);
      logger.log(`gRPC ${SERVICE_NAME} on ${grpcPort}`);
      logger.log(`Propagating headers to trailers: ${JSON.stringify(middleware.rule.toJSON())}`);

      if (options.admin !== false) {
        const admin = createAdminApp({
          getStatus: () => ({
            grpc_port: grpcPort,
            service: SERVICE_NAME,
            methods: Object.keys(service.definition),
            propagation: middleware.rule.toJSON(),
            metrics: metrics.getMetrics(),
          }),
        });
        httpServer = admin.listen(config.httpPort, "0.0.0.0", () => logger.log(`HTTP admin on ${config.httpPort}`));
      }
      return grpcPort;
    },

    async stop() {
      const http = httpServer;
      httpServer = null;
      if (http) await new Promise<void>((resolve) => http.close(() => resolve()));
      await shutdown(grpcServer);
      logger.log("Servers stopped");
    },
  };
}

async function main() {
  const bootLogger = createLogger();
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (e) {
    bootLogger.err(e instanceof ConfigurationError ? `Configuration error: ${e.message}` : errorMessage(e, "failed to load config"));
    process.exit(1);
  }

  const logger = createLogger(config.debug);
  const app = createApp(config, { logger });
  await app.start();

  const stop = (signal: string) => {
    logger.log(`Received ${signal}, shutting down...`);
    app
      .stop()
      .then(() => process.exit(0))
      .catch((e: unknown) => {
        logger.err("Shutdown failed:", errorMessage(e, "unknown error"));
        process.exit(1);
      });
  };
  process.on("SIGINT", () => stop("SIGINT"));
  process.on("SIGTERM", () => stop("SIGTERM"));
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((e: unknown) => {
    console.error("[trailerbridge]", e instanceof ConfigurationError ? `Configuration error: ${e.message}` : e);
    process.exit(1);
  });
}
