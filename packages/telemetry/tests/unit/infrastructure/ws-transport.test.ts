/**
 * @file ws-transport.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WsTransport } from '../../../src/infrastructure/websocket/index.js';
import { FakeSocket, flushImmediates } from '../../helpers/fakes.js';
import { createTestLogger } from '../../helpers/logger.js';

describe('WsTransport', () => {
  let transport: WsTransport;
  const onWritable = vi.fn<(id: number) => void>();
  const onSendError = vi.fn<(id: number, error: Error) => void>();

  beforeEach(() => {
    onWritable.mockReset();
    onSendError.mockReset();
    transport = new WsTransport({ highWaterMark: 100, drainRetryMs: 5 }, createTestLogger());
    transport.bind({ onWritable, onSendError });
  });

  describe('attach', () => {
    it('should hand out the lowest free id', () => {
      expect(transport.attach(new FakeSocket())).toBe(1);
      expect(transport.attach(new FakeSocket())).toBe(2);

      transport.detach(1);

      expect(transport.attach(new FakeSocket())).toBe(1);
      expect(transport.size).toBe(2);
    });
  });

  describe('write', () => {
    it('should send and report the byte length', () => {
      const socket = new FakeSocket();
      const id = transport.attach(socket);

      expect(transport.write(id, 'héllo')).toBe(6);
      expect(socket.sent).toEqual(['héllo']);
    });

    it('should write nothing to a socket that is not open', () => {
      const socket = new FakeSocket();
      socket.readyState = 3;
      const id = transport.attach(socket);

      expect(transport.write(id, 'frame')).toBe(0);
      expect(socket.sent).toEqual([]);
    });

    it('should write nothing to an unknown id', () => {
      expect(transport.write(42, 'frame')).toBe(0);
    });

    it('should report asynchronous send errors', () => {
      const socket = new FakeSocket();
      const error = new Error('EPIPE');
      socket.sendError = error;
      const id = transport.attach(socket);

      transport.write(id, 'frame');

      expect(onSendError).toHaveBeenCalledWith(id, error);
    });
  });

  describe('requestWritable', () => {
    it('should coalesce requests into one notification', async () => {
      const id = transport.attach(new FakeSocket());

      transport.requestWritable(id);
      transport.requestWritable(id);
      await flushImmediates();

      expect(onWritable).toHaveBeenCalledTimes(1);
      expect(onWritable).toHaveBeenCalledWith(id);
    });

    it('should wait for the send buffer to drain below the high-water mark', async () => {
      const socket = new FakeSocket();
      socket.bufferedAmount = 500;
      const id = transport.attach(socket);

      transport.requestWritable(id);
      await flushImmediates();
      expect(onWritable).not.toHaveBeenCalled();

      socket.bufferedAmount = 0;
      await vi.waitFor(() => expect(onWritable).toHaveBeenCalledWith(id));
    });

    it('should drop the notification once the socket is detached', async () => {
      const id = transport.attach(new FakeSocket());

      transport.requestWritable(id);
      transport.detach(id);
      await flushImmediates();

      expect(onWritable).not.toHaveBeenCalled();
    });
  });

  describe('close', () => {
    it('should close the socket with the given code', () => {
      const socket = new FakeSocket();
      const id = transport.attach(socket);

      transport.close(id, 1011, 'Write failure');

      expect(socket.closeCalls).toEqual([{ code: 1011, reason: 'Write failure' }]);
      expect(socket.terminated).toBe(false);
    });

    it('should terminate when close throws', () => {
      const socket = new FakeSocket();
      socket.closeThrows = true;
      const id = transport.attach(socket);

      transport.close(id, 1011, 'Write failure');

      expect(socket.terminated).toBe(true);
    });

    it('should ignore unknown ids', () => {
      expect(() => transport.close(7)).not.toThrow();
    });
  });
});
