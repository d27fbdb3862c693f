import type { FastifyInstance, FastifyReply } from "fastify";
import {
  messageCreateSchema,
  messageIdParamsSchema,
  messageUpdateSchema,
} from "@chatterbox/shared";
import {
  notFoundMessage,
  type MessageStore,
  type StoreFailure,
  type StoreFailureKind,
} from "./repo.js";

export interface MessagesRoutesOptions {
  store: MessageStore;
}

const STATUS_BY_KIND: Record<StoreFailureKind, 400 | 404> = {
  not_found: 404,
  validation: 400,
  constraint: 400,
};

const messageJsonSchema = {
  type: "object",
  properties: {
    id: { type: "integer" },
    body: { type: "string" },
    username: { type: "string" },
    created_at: { type: "string", format: "date-time" },
    updated_at: { type: ["string", "null"], format: "date-time" },
  },
  required: ["id", "body", "username", "created_at", "updated_at"],
} as const;

const errorJsonSchema = {
  type: "object",
  properties: { error: { type: "string" } },
  required: ["error"],
} as const;

const idParamsJsonSchema = {
  type: "object",
  properties: { id: { type: "string", description: "Message id" } },
  required: ["id"],
} as const;

function sendFailure(reply: FastifyReply, failure: StoreFailure) {
  return reply
    .status(STATUS_BY_KIND[failure.kind])
    .send({ error: failure.message });
}

/** Anything but a plain decimal id can never match a row, so callers answer it with the usual 404. */
function parseId(params: { id: string }): number | undefined {
  const parsed = messageIdParamsSchema.safeParse(params);
  return parsed.success ? parsed.data.id : undefined;
}

export async function messagesRoutes(
  app: FastifyInstance,
  opts: MessagesRoutesOptions,
) {
  const { store } = opts;

  app.get(
    "/messages",
    {
      schema: {
        tags: ["Messages"],
        summary: "List messages",
        description: "All messages, oldest first.",
        response: {
          200: { description: "Messages", type: "array", items: messageJsonSchema },
        },
      },
    },
    async () => store.listAll(),
  );

  app.get<{ Params: { id: string } }>(
    "/messages/:id",
    {
      schema: {
        tags: ["Messages"],
        summary: "Get message",
        params: idParamsJsonSchema,
        response: {
          200: { description: "Message", ...messageJsonSchema },
          404: { description: "Unknown id", ...errorJsonSchema },
        },
      },
    },
    async (request, reply) => {
      const id = parseId(request.params);
      if (id === undefined) {
        return reply
          .status(404)
          .send({ error: notFoundMessage(request.params.id) });
      }
      const message = store.findById(id);
      if (!message) {
        return reply.status(404).send({ error: notFoundMessage(id) });
      }
      return message;
    },
  );

  app.post(
    "/messages",
    {
      schema: {
        tags: ["Messages"],
        summary: "Create message",
        // Field types are left to the zod schema: typed properties here
        // would let Ajv coerce 1 to "1" and null to "" before it runs.
        body: {
          type: "object",
          description: "`body` and `username`, both non-empty strings",
        },
        response: {
          201: { description: "Created message", ...messageJsonSchema },
          400: { description: "Missing or empty field", ...errorJsonSchema },
        },
      },
    },
    async (request, reply) => {
      const parsed = messageCreateSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: parsed.error.issues[0]?.message ?? "Validation failed" });
      }
      const result = store.create(parsed.data.body, parsed.data.username);
      if (!result.ok) return sendFailure(reply, result);
      request.log.info({ messageId: result.value.id }, "Message created");
      return reply.status(201).send(result.value);
    },
  );

  app.patch<{ Params: { id: string } }>(
    "/messages/:id",
    {
      schema: {
        tags: ["Messages"],
        summary: "Edit message body",
        description: "Replaces the body and stamps updated_at. The username cannot be changed.",
        params: idParamsJsonSchema,
        body: {
          type: "object",
          description: "`body`, a non-empty string",
        },
        response: {
          200: { description: "Updated message", ...messageJsonSchema },
          400: { description: "Missing or empty body", ...errorJsonSchema },
          404: { description: "Unknown id", ...errorJsonSchema },
        },
      },
    },
    async (request, reply) => {
      const id = parseId(request.params);
      if (id === undefined) {
        return reply
          .status(404)
          .send({ error: notFoundMessage(request.params.id) });
      }
      const parsed = messageUpdateSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: parsed.error.issues[0]?.message ?? "Validation failed" });
      }
      const result = store.update(id, parsed.data.body);
      if (!result.ok) return sendFailure(reply, result);
      return result.value;
    },
  );

  app.delete<{ Params: { id: string } }>(
    "/messages/:id",
    {
      schema: {
        tags: ["Messages"],
        summary: "Delete message",
        params: idParamsJsonSchema,
        response: {
          200: {
            description: "Deleted",
            type: "object",
            properties: { message: { type: "string" } },
            required: ["message"],
          },
          404: { description: "Unknown id", ...errorJsonSchema },
        },
      },
    },
    async (request, reply) => {
      const id = parseId(request.params);
      if (id === undefined) {
        return reply
          .status(404)
          .send({ error: notFoundMessage(request.params.id) });
      }
      const result = store.delete(id);
      if (!result.ok) return sendFailure(reply, result);
      request.log.info({ messageId: id }, "Message deleted");
      return { message: `Message with id ${id} successfully deleted` };
    },
  );
}
