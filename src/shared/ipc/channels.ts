/**
 * IPC contract between the renderer and the backend process.
 * Each channel has a zod payload schema (checked by the backend router) and
 * a response type (what the renderer gets back).
 */
import { z } from 'zod';
import type {
  DirectoryListing,
  ExtractionOutcome,
  PublicAppConfig,
} from '../types/extractor.types';

const ClipRequestSchema = z.object({
  path: z.string().min(1),
  inSeconds: z.number().int().min(0),
  outSeconds: z.number().int().min(0),
});

export const IpcPayloadSchemas = {
  'app:get-config': z.object({}),
  'fs:list-directory': z.object({
    directory: z.string().optional(),
  }),
  'extractor:extract-clip': ClipRequestSchema,
  'extractor:extract-all': z.object({
    requests: z.array(ClipRequestSchema),
  }),
  'player:play-file': z.object({
    path: z.string().min(1),
  }),
} as const;

export type IpcChannel = keyof typeof IpcPayloadSchemas;

export type IpcPayload<C extends IpcChannel> = z.infer<
  (typeof IpcPayloadSchemas)[C]
>;

export type IpcFailure = { success: false; error: string };

export interface IpcResponses {
  'app:get-config': { success: true; config: PublicAppConfig } | IpcFailure;
  'fs:list-directory':
    | ({ success: true } & DirectoryListing)
    | IpcFailure;
  'extractor:extract-clip':
    | { success: true; outcome: ExtractionOutcome }
    | IpcFailure;
  'extractor:extract-all':
    | { success: true; outcomes: ExtractionOutcome[] }
    | IpcFailure;
  'player:play-file': { success: true } | IpcFailure;
}

/** Every channel can also fail at the transport or validation level */
export type IpcResponse<C extends IpcChannel> = IpcResponses[C] | IpcFailure;

export const IPC_ROUTE_PREFIX = '/ipc/';

export const isIpcChannel = (value: string): value is IpcChannel =>
  Object.prototype.hasOwnProperty.call(IpcPayloadSchemas, value);
