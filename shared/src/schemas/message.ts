import { z } from 'zod';

export const MISSING_CREATE_FIELDS = "Missing required fields: 'body' and 'username'";
export const EMPTY_CREATE_FIELDS = 'Body and username cannot be empty.';
export const MISSING_UPDATE_BODY = "Missing 'body' field in request body for update";
export const EMPTY_UPDATE_BODY = 'Message body cannot be empty.';

/** Required string field: a distinct message for an absent key and for a non-string value. */
const requiredText = (field: string, missing: string, empty: string) =>
  z
    .string({
      error: (issue) => (issue.input === undefined ? missing : `'${field}' must be a string`),
    })
    .min(1, { error: empty });

/** Body for POST /messages. */
export const messageCreateSchema = z.object(
  {
    body: requiredText('body', MISSING_CREATE_FIELDS, EMPTY_CREATE_FIELDS),
    username: requiredText('username', MISSING_CREATE_FIELDS, EMPTY_CREATE_FIELDS),
  },
  { error: MISSING_CREATE_FIELDS },
);

/** Body for PATCH /messages/:id. Only the body is editable; username is fixed at creation. */
export const messageUpdateSchema = z.object(
  {
    body: requiredText('body', MISSING_UPDATE_BODY, EMPTY_UPDATE_BODY),
  },
  { error: MISSING_UPDATE_BODY },
);

/**
 * Path params for /messages/:id. Only plain decimal digits name a message;
 * `1e0`, `0x1` or ` 1` are not aliases for id 1.
 */
export const messageIdParamsSchema = z.object({
  id: z
    .string()
    .regex(/^[1-9]\d*$/)
    .transform(Number)
    .refine((id) => Number.isSafeInteger(id)),
});

export type MessageCreateBody = z.infer<typeof messageCreateSchema>;
export type MessageUpdateBody = z.infer<typeof messageUpdateSchema>;
export type MessageIdParams = z.infer<typeof messageIdParamsSchema>;

/** Wire shape of a message. Timestamps are ISO-8601 strings. */
export interface Message {
  id: number;
  body: string;
  username: string;
  created_at: string;
  updated_at: string | null;
}
