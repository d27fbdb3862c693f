import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import fastifySwagger from "@fastify/swagger";
import fastifySwaggerUi from "@fastify/swagger-ui";
import {
  APP_NAME,
  CORS_ORIGIN,
  LOGGER,
  RATE_LIMIT_MAX,
  RATE_LIMIT_TIME_WINDOW,
  SWAGGER_ENABLED,
  SWAGGER_UI_ROUTE_PREFIX,
  TRUST_PROXY,
} from "./config.js";
import { getRootVersion, healthRoutes } from "./modules/health/index.js";
import { homeRoutes } from "./modules/home/index.js";
import { messagesRoutes, type MessageStore } from "./modules/messages/index.js";

export const INTERNAL_ERROR = "Internal Server Error";
export const NOT_FOUND_ERROR = "Resource not found";

export interface BuildAppOptions {
  store: MessageStore;
  /** Defaults to LOGGER from config. */
  logger?: boolean;
  /** Serve Swagger UI. Defaults to SWAGGER_ENABLED from config. */
  swaggerUi?: boolean;
  /** Requests per RATE_LIMIT_TIME_WINDOW. Defaults to RATE_LIMIT_MAX from config. */
  rateLimitMax?: number;
}

export async function buildApp(
  options: BuildAppOptions,
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? LOGGER,
    trustProxy: TRUST_PROXY,
  });

  // Every failure leaves as { error }. Client errors keep their status and
  // message; anything else is logged and answered with a bare 500.
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.status(statusCode).send({ error: error.message });
    }
    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({ error: INTERNAL_ERROR });
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({ error: NOT_FOUND_ERROR });
  });

  await app.register(cors, { origin: CORS_ORIGIN });

  await app.register(rateLimit, {
    max: options.rateLimitMax ?? RATE_LIMIT_MAX,
    timeWindow: RATE_LIMIT_TIME_WINDOW,
    errorResponseBuilder: (_request, context) => ({
      statusCode: context.statusCode,
      error: "Too Many Requests",
      message: `Rate limit exceeded, retry in ${context.after}`,
    }),
  });

  await app.register(fastifySwagger, {
    openapi: {
      openapi: "3.0.0",
      info: {
        title: `${APP_NAME} API`,
        description: `REST API for ${APP_NAME}: post, list, edit and delete short messages.`,
        version: getRootVersion() ?? "unknown",
      },
    },
  });

  if (options.swaggerUi ?? SWAGGER_ENABLED) {
    await app.register(fastifySwaggerUi, {
      routePrefix: SWAGGER_UI_ROUTE_PREFIX,
      uiConfig: { docExpansion: "list", tryItOutEnabled: true },
    });
  }

  await app.register(homeRoutes);
  await app.register(healthRoutes, { store: options.store });
  await app.register(messagesRoutes, { store: options.store });

  return app;
}
