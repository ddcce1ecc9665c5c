/**
 * IPC router: channel handler registry with payload validation.
 * Handlers answer with `{ success, ... }` results; the router turns unknown
 * channels, bad payloads and thrown errors into failure results as well.
 */
import type { z } from 'zod';
import {
  IpcPayloadSchemas,
  isIpcChannel,
  type IpcChannel,
  type IpcFailure,
  type IpcPayload,
  type IpcResponses,
} from '../../shared/ipc/channels';

export type IpcHandler<C extends IpcChannel> = (
  payload: IpcPayload<C>,
) => Promise<IpcResponses[C]> | IpcResponses[C];

type HandlerMap = { [C in IpcChannel]?: IpcHandler<C> };

type SchemaMap = {
  [C in IpcChannel]: z.ZodType<IpcPayload<C>, z.ZodTypeDef, unknown>;
};

const payloadSchemas: SchemaMap = IpcPayloadSchemas;

export interface DispatchResult {
  status: number;
  body: IpcResponses[IpcChannel] | IpcFailure;
}

const failure = (status: number, error: string): DispatchResult => ({
  status,
  body: { success: false, error },
});

export class IpcRouter {
  private readonly handlers: HandlerMap = {};

  handle<C extends IpcChannel>(channel: C, handler: IpcHandler<C>): void {
    if (this.handlers[channel]) {
      throw new Error(`IPC handler already registered for ${channel}`);
    }
    this.handlers[channel] = handler;
  }

  has(channel: string): boolean {
    return isIpcChannel(channel) && this.handlers[channel] !== undefined;
  }

  async dispatch(channel: string, rawPayload: unknown): Promise<DispatchResult> {
    if (!isIpcChannel(channel)) {
      return failure(404, `Unknown IPC channel: ${channel}`);
    }
    return this.dispatchChannel(channel, rawPayload);
  }

  private async dispatchChannel<C extends IpcChannel>(
    channel: C,
    rawPayload: unknown,
  ): Promise<DispatchResult> {
    const handler: IpcHandler<C> | undefined = this.handlers[channel];
    if (!handler) {
      return failure(404, `No handler registered for ${channel}`);
    }

    const parsed = payloadSchemas[channel].safeParse(rawPayload ?? {});
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
        .join('; ');
      console.warn(`⚠️ Invalid payload for ${channel}: ${details}`);
      return failure(400, `Invalid payload for ${channel}: ${details}`);
    }

    try {
      const body = await handler(parsed.data);
      return { status: 200, body };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`❌ IPC handler ${channel} failed:`, error);
      return failure(500, message);
    }
  }
}
