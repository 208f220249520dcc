/**
 * @file connection.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export interface ConnectionProps {
  id: number;
  permissions?: Iterable<string>;
  createdAt?: Date;
}

/**
 * Entity representing one connected browser client.
 * Holds the outbound text buffer that is drained when the socket is writable.
 */
export class Connection {
  private readonly _id: number;
  private readonly _createdAt: Date;
  private readonly _outboundBuffer: string[] = [];
  private readonly _permissions: Set<string>;
  private readonly _attributes = new Map<string, string>();

  constructor(props: ConnectionProps) {
    this._id = props.id;
    this._createdAt = props.createdAt ?? new Date();
    this._permissions = new Set(props.permissions ?? []);
  }

  get id(): number {
    return this._id;
  }

  get createdAt(): Date {
    return this._createdAt;
  }

  /**
   * Number of payloads waiting to be written.
   */
  get pendingCount(): number {
    return this._outboundBuffer.length;
  }

  get permissions(): string[] {
    return Array.from(this._permissions);
  }

  /**
   * Appends a payload at the tail of the outbound buffer.
   */
  enqueue(payload: string): void {
    this._outboundBuffer.push(payload);
  }

  /**
   * Returns the payload at the head of the buffer without removing it.
   */
  peek(): string | undefined {
    return this._outboundBuffer[0];
  }

  /**
   * Removes the head payload. Call only after the transport accepted it.
   */
  shift(): string | undefined {
    return this._outboundBuffer.shift();
  }

  /**
   * Discards every pending payload and returns how many were dropped.
   */
  clearBuffer(): number {
    const dropped = this._outboundBuffer.length;
    this._outboundBuffer.length = 0;
    return dropped;
  }

  hasPermission(permission: string): boolean {
    return this._permissions.has(permission);
  }

  grant(permission: string): void {
    this._permissions.add(permission);
  }

  revoke(permission: string): boolean {
    return this._permissions.delete(permission);
  }

  setAttribute(key: string, value: string): void {
    this._attributes.set(key, value);
  }

  /**
   * Returns the attribute value, or an empty string when the key is unset.
   */
  getAttribute(key: string): string {
    return this._attributes.get(key) ?? '';
  }
}
