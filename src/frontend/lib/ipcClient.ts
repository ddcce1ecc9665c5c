/**
 * Renderer-side IPC: posts a channel payload to the backend process and
 * returns its `{ success, ... }` result. Transport problems come back as a
 * failure result instead of a rejected promise.
 */
import {
  IPC_ROUTE_PREFIX,
  type IpcChannel,
  type IpcPayload,
  type IpcResponse,
} from '@/shared/ipc/channels';

export async function invoke<C extends IpcChannel>(
  channel: C,
  payload: IpcPayload<C>,
): Promise<IpcResponse<C>> {
  try {
    const response = await fetch(`${IPC_ROUTE_PREFIX}${channel}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });

    const result: IpcResponse<C> = await response.json();
    return result;
  } catch (error) {
    console.error(`❌ IPC call ${channel} failed:`, error);
    return {
      success: false,
      error:
        error instanceof Error
          ? `Backend unreachable: ${error.message}`
          : 'Backend unreachable',
    };
  }
}
