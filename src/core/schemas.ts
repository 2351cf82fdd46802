import { z } from 'zod';

/**
 * Response schemas per endpoint. Each requires only what the server always sends and
 * passes every other field through.
 */

const event = z
  .object({
    type: z.string(),
    content: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const initialSyncResponse = z
  .object({
    end: z.string(),
    presence: z.array(event).optional(),
    rooms: z.array(z.record(z.unknown())).optional(),
  })
  .passthrough();

export const authResponse = z
  .object({
    user_id: z.string(),
    access_token: z.string(),
    home_server: z.string().optional(),
  })
  .passthrough();

export const createRoomResponse = z
  .object({
    room_id: z.string(),
    room_alias: z.string().optional(),
  })
  .passthrough();

export const joinRoomResponse = z
  .object({
    room_id: z.string(),
  })
  .passthrough();

export const eventStreamResponse = z
  .object({
    start: z.string(),
    end: z.string(),
    chunk: z.array(event),
  })
  .passthrough();

export const sendStateEventResponse = z
  .object({
    event_id: z.string().optional(),
  })
  .passthrough();

export const sendMessageEventResponse = z
  .object({
    event_id: z.string(),
  })
  .passthrough();

export type InitialSyncResponse = z.infer<typeof initialSyncResponse>;
export type AuthResponse = z.infer<typeof authResponse>;
export type CreateRoomResponse = z.infer<typeof createRoomResponse>;
export type JoinRoomResponse = z.infer<typeof joinRoomResponse>;
export type EventStreamResponse = z.infer<typeof eventStreamResponse>;
export type SendStateEventResponse = z.infer<typeof sendStateEventResponse>;
export type SendMessageEventResponse = z.infer<typeof sendMessageEventResponse>;
