/**
 * @file transport.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Port for the socket layer underneath the router.
 */
export interface Transport {
  /**
   * Writes one text payload to the socket.
   * Returns the number of bytes the socket accepted (0 when it is gone).
   */
  write(id: number, payload: string): number;

  /**
   * Asks for a writable notification for the socket.
   * Repeated requests before the notification fires are coalesced.
   */
  requestWritable(id: number): void;

  /**
   * Closes the socket. Unknown ids are ignored.
   */
  close(id: number, code?: number, reason?: string): void;
}
