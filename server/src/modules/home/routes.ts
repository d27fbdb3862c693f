import type { FastifyInstance } from "fastify";
import { APP_NAME } from "../../config.js";

export async function homeRoutes(app: FastifyInstance) {
  app.get(
    "/",
    {
      schema: {
        tags: ["Home"],
        summary: "Banner",
        description: "Plain HTML banner naming the API.",
      },
    },
    async (_request, reply) => {
      return reply.type("text/html; charset=utf-8").send(`<h1>${APP_NAME} API</h1>`);
    },
  );
}
