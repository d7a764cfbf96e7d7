import { once } from 'node:events';
import { randomUUID } from 'node:crypto';
import WebSocket, { type RawData } from 'ws';

import { WARM_WHITE, clamp01, type Rgb } from '../color/colorSpaces.js';
import { TransportError, describeError, type Logger, type TransportOperation } from '../errors.js';
import type { Vec3 } from '../layout/zones.js';
import type { LightHandle, LightSpec, LightTransport, LightUpdate } from './types.js';

export const POINT_LIGHT_COMPONENT = '[FrooxEngine]FrooxEngine.PointLight';
export const VARIABLE_SPACE_COMPONENT = '[FrooxEngine]FrooxEngine.DynamicVariableSpace';
const ID_PREFIX = 'ZL_';

export type LinkTransportOptions = {
  url: string;
  parentSlotId: string;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
  intensityScale: number;
  range: number;
  rootName?: string;
  logger?: Logger;
};

type Wrapped = { $type: string; [key: string]: unknown };
type LinkMessage = { $type: string; messageId?: string; [key: string]: unknown };
export type LinkReply = Record<string, unknown>;

type PendingRequest = {
  operation: TransportOperation;
  handle?: string;
  resolve: (reply: LinkReply | null) => void;
  reject: (error: TransportError) => void;
  timer: NodeJS.Timeout;
};

export const reference = (targetId: string): Wrapped => ({ $type: 'reference', targetId });

export const float3 = ({ x, y, z }: Vec3): Wrapped => ({ $type: 'float3', value: { x, y, z } });

export const colorValue = ({ r, g, b }: Rgb): Wrapped => float3({ x: r, y: g, z: b });

export const floatValue = (value: number): Wrapped => ({ $type: 'float', value });

export const stringValue = (value: string): Wrapped => ({ $type: 'string', value });

/** Rotation about the vertical axis as a unit quaternion. */
export const yawQuaternion = (degrees: number): Wrapped => {
  const half = (degrees * Math.PI) / 360;
  return { $type: 'floatQ', value: { x: 0, y: Math.sin(half), z: 0, w: Math.cos(half) } };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const decode = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
};

const shortId = () => randomUUID().replace(/-/g, '').slice(0, 8);

type LinkLight = {
  slotId: string;
  componentId: string;
};

/**
 * JSON-over-WebSocket session with the host. Every light is a slot under a
 * session root slot carrying a point light component; closing the session
 * removes the root and with it every light.
 */
export class LinkTransport implements LightTransport {
  readonly name = 'link';
  private socket: WebSocket | null = null;
  private rootSlotId: string | null = null;
  private readonly pending = new Map<string, PendingRequest>();
  private readonly lights = new Map<string, LinkLight>();
  private readonly logger: Logger;
  private messageCounter = 0;

  private constructor(private readonly options: LinkTransportOptions) {
    this.logger = options.logger ?? console;
  }

  /** Connects and creates the session root slot. */
  static async connect(options: LinkTransportOptions): Promise<LinkTransport> {
    const transport = new LinkTransport(options);
    await transport.open();
    return transport;
  }

  get rootId(): string | null {
    return this.rootSlotId;
  }

  private async open(): Promise<void> {
    const { url, connectTimeoutMs } = this.options;
    const socket = new WebSocket(url, { handshakeTimeout: connectTimeoutMs });
    try {
      await once(socket, 'open');
    } catch (error) {
      throw new TransportError('connect', `could not connect to ${url}: ${describeError(error)}`, {
        cause: error,
      });
    }
    this.socket = socket;
    socket.on('message', (data: RawData) => this.handleMessage(data));
    socket.on('error', (error: Error) => {
      this.logger.warn(`[transport] socket error: ${error.message}`);
    });
    socket.on('close', () => {
      this.socket = null;
      this.failPending(new TransportError('close', 'connection closed'));
    });
    this.logger.log(`[transport] connected to ${url}`);

    const rootSlotId = `${ID_PREFIX}Root_${shortId()}`;
    try {
      await this.request('connect', {
        $type: 'addSlot',
        data: {
          id: rootSlotId,
          parent: reference(this.options.parentSlotId),
          name: stringValue(this.options.rootName ?? 'Zone Lights'),
        },
      });
      this.rootSlotId = rootSlotId;
      await this.request('connect', {
        $type: 'addComponent',
        containerSlotId: rootSlotId,
        data: {
          id: `${ID_PREFIX}Space_${shortId()}`,
          componentType: VARIABLE_SPACE_COMPONENT,
          members: { SpaceName: stringValue('ZoneLights') },
        },
      });
    } catch (error) {
      socket.terminate();
      throw error;
    }
  }

  private handleMessage(data: RawData) {
    let payload: unknown;
    try {
      payload = JSON.parse(decode(data));
    } catch (error) {
      this.logger.warn(`[transport] ignoring non-JSON message: ${describeError(error)}`);
      return;
    }
    if (!isRecord(payload) || typeof payload.sourceMessageId !== 'string') return;
    const request = this.pending.get(payload.sourceMessageId);
    if (!request) return;
    this.pending.delete(payload.sourceMessageId);
    clearTimeout(request.timer);
    if (payload.success === false) {
      const detail = typeof payload.errorInfo === 'string' ? payload.errorInfo : 'request failed';
      request.reject(new TransportError(request.operation, detail, { handle: request.handle }));
      return;
    }
    request.resolve(payload);
  }

  private nextMessageId(): string {
    this.messageCounter += 1;
    return `${ID_PREFIX}Msg_${this.messageCounter}`;
  }

  private send(operation: TransportOperation, message: LinkMessage, handle?: string): string {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      throw new TransportError(operation, 'not connected', { handle });
    }
    const messageId = this.nextMessageId();
    socket.send(JSON.stringify({ ...message, messageId }), (error) => {
      if (!error) return;
      this.logger.warn(`[transport] ${operation} send failed: ${error.message}`);
    });
    return messageId;
  }

  /**
   * Sends a message and waits for the reply carrying its id. An unanswered
   * request resolves with null after `requestTimeoutMs`.
   */
  private request(
    operation: TransportOperation,
    message: LinkMessage,
    handle?: string,
  ): Promise<LinkReply | null> {
    return new Promise<LinkReply | null>((resolve, reject) => {
      const messageId = this.send(operation, message, handle);
      const timer = setTimeout(() => {
        this.pending.delete(messageId);
        resolve(null);
      }, this.options.requestTimeoutMs);
      this.pending.set(messageId, { operation, handle, resolve, reject, timer });
    });
  }

  private failPending(error: TransportError) {
    for (const [id, request] of this.pending) {
      clearTimeout(request.timer);
      this.pending.delete(id);
      request.reject(
        new TransportError(request.operation, error.message, { handle: request.handle, cause: error }),
      );
    }
  }

  async createLight(spec: LightSpec): Promise<LightHandle> {
    const rootSlotId = this.rootSlotId;
    if (!rootSlotId) {
      throw new TransportError('create', 'session root slot is missing');
    }
    const tag = `${spec.globalIndex}_${shortId()}`;
    const slotId = `${ID_PREFIX}Light_${tag}`;
    const componentId = `${ID_PREFIX}Comp_${tag}`;
    await this.request(
      'create',
      {
        $type: 'addSlot',
        data: {
          id: slotId,
          parent: reference(rootSlotId),
          name: stringValue(`Light_${spec.zone}_${spec.index}`),
          position: float3(spec.position),
        },
      },
      slotId,
    );
    await this.request(
      'create',
      {
        $type: 'addComponent',
        containerSlotId: slotId,
        data: {
          id: componentId,
          componentType: POINT_LIGHT_COMPONENT,
          members: {
            Color: colorValue(WARM_WHITE),
            Intensity: floatValue(this.options.intensityScale),
            Range: floatValue(this.options.range),
          },
        },
      },
      slotId,
    );
    this.lights.set(slotId, { slotId, componentId });
    return { id: slotId, globalIndex: spec.globalIndex };
  }

  updateLight(handle: LightHandle, update: LightUpdate): void {
    const light = this.lights.get(handle.id);
    if (!light) {
      throw new TransportError('update', `unknown light ${handle.id}`, { handle: handle.id });
    }
    this.send(
      'update',
      {
        $type: 'updateComponent',
        data: {
          id: light.componentId,
          members: {
            Color: colorValue(update.color),
            Intensity: floatValue(clamp01(update.intensity) * this.options.intensityScale),
          },
        },
      },
      handle.id,
    );
    if (update.rotation !== undefined) {
      this.send(
        'update',
        { $type: 'updateSlot', data: { id: light.slotId, rotation: yawQuaternion(update.rotation) } },
        handle.id,
      );
    }
  }

  async removeLight(handle: LightHandle): Promise<void> {
    await this.request('remove', { $type: 'removeSlot', slotId: handle.id }, handle.id);
    this.lights.delete(handle.id);
  }

  /** Removes the session root (best effort) and closes the socket. */
  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    const rootSlotId = this.rootSlotId;
    this.rootSlotId = null;
    if (rootSlotId && socket.readyState === WebSocket.OPEN) {
      try {
        await this.request('close', { $type: 'removeSlot', slotId: rootSlotId }, rootSlotId);
      } catch (error) {
        this.logger.warn(`[transport] failed to remove session root: ${describeError(error)}`);
      }
    }
    this.lights.clear();
    if (socket.readyState === WebSocket.CLOSED) return;
    const closed = once(socket, 'close', { signal: AbortSignal.timeout(this.options.connectTimeoutMs) });
    socket.close();
    try {
      await closed;
    } catch (error) {
      this.logger.warn(`[transport] close handshake did not finish (${describeError(error)}); terminating`);
      socket.terminate();
    }
  }
}
