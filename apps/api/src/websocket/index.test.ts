/**
 * WebSocket Handler Tests
 */
import { describe, it, expect, vi } from 'vitest';
import type { WebSocket } from 'ws';
import { PIPELINE_STATES, type PipelineRun } from '@pipewright/shared';
import {
  broadcastRunCompleted,
  broadcastRunState,
  broadcastStepOutput,
  handleMessage,
  removeSubscriber,
} from './index.js';

const createMockSocket = () => ({
  readyState: 1,
  send: vi.fn(),
});

const sentMessages = (socket: ReturnType<typeof createMockSocket>) =>
  socket.send.mock.calls.map(([data]) => JSON.parse(String(data)) as { type: string; payload?: unknown });

const run: PipelineRun = {
  id: 'run-ws-1',
  trigger: { kind: 'push', branch: 'master', receivedAt: new Date('2026-01-01T00:00:00Z') },
  state: PIPELINE_STATES.BUILDING,
  workDir: '/tmp/source',
  steps: [],
  createdAt: new Date('2026-01-01T00:00:00Z'),
};

describe('WebSocket handlers', () => {
  it('should answer ping with pong', () => {
    const socket = createMockSocket();
    handleMessage(socket as unknown as WebSocket, { type: 'ping' });

    expect(sentMessages(socket)[0]?.type).toBe('pong');
  });

  it('should require a channel to subscribe', () => {
    const socket = createMockSocket();
    handleMessage(socket as unknown as WebSocket, { type: 'subscribe' });

    expect(sentMessages(socket)[0]).toEqual({ type: 'error', message: 'Channel required for subscription' });
  });

  it('should stream step output to run subscribers', () => {
    const socket = createMockSocket();
    handleMessage(socket as unknown as WebSocket, { type: 'subscribe', payload: { channel: 'run:run-ws-1' } });
    socket.send.mockClear();

    broadcastStepOutput({ runId: 'run-ws-1', step: 'build', stream: 'stdout', data: 'Compiling\n' });
    broadcastStepOutput({ runId: 'run-other', step: 'build', stream: 'stdout', data: 'ignored\n' });

    expect(sentMessages(socket)).toEqual([
      {
        type: 'step:output',
        payload: { runId: 'run-ws-1', step: 'build', stream: 'stdout', data: 'Compiling\n' },
      },
    ]);
  });

  it('should send state changes to run subscribers', () => {
    const socket = createMockSocket();
    handleMessage(socket as unknown as WebSocket, { type: 'subscribe', payload: { channel: 'run:run-ws-1' } });
    socket.send.mockClear();

    broadcastRunState(run, {
      runId: 'run-ws-1',
      from: PIPELINE_STATES.IDLE,
      to: PIPELINE_STATES.BUILDING,
      reason: 'run_started',
      at: new Date('2026-01-01T00:00:01Z'),
    });

    expect(sentMessages(socket)).toEqual([
      {
        type: 'run:state',
        payload: {
          runId: 'run-ws-1',
          from: 'IDLE',
          to: 'BUILDING',
          reason: 'run_started',
          timestamp: '2026-01-01T00:00:01.000Z',
        },
      },
    ]);
  });

  it('should stop sending after unsubscribe', () => {
    const socket = createMockSocket();
    const subscribe = { type: 'subscribe', payload: { channel: 'run:run-ws-2' } };
    handleMessage(socket as unknown as WebSocket, subscribe);
    handleMessage(socket as unknown as WebSocket, { ...subscribe, type: 'unsubscribe' });
    socket.send.mockClear();

    broadcastStepOutput({ runId: 'run-ws-2', step: 'test', stream: 'stderr', data: 'late\n' });

    expect(socket.send).not.toHaveBeenCalled();
  });

  it('should not send run updates to clients subscribed to other runs', () => {
    const watcher = createMockSocket();
    handleMessage(watcher as unknown as WebSocket, { type: 'subscribe', payload: { channel: 'run:run-ws-9' } });
    watcher.send.mockClear();

    broadcastRunState({ ...run, id: 'run-ws-3' }, {
      runId: 'run-ws-3',
      from: PIPELINE_STATES.IDLE,
      to: PIPELINE_STATES.BUILDING,
      reason: 'run_started',
      at: new Date('2026-01-01T00:00:01Z'),
    });
    broadcastRunCompleted({ ...run, id: 'run-ws-3', state: PIPELINE_STATES.SUCCEEDED });

    expect(watcher.send).not.toHaveBeenCalled();
  });

  it('should send run completion to the run channel', () => {
    const socket = createMockSocket();
    handleMessage(socket as unknown as WebSocket, { type: 'subscribe', payload: { channel: 'run:run-ws-4' } });
    socket.send.mockClear();

    broadcastRunCompleted({ ...run, id: 'run-ws-4', state: PIPELINE_STATES.FAILED, failureReason: 'Build failed with exit code 101' });

    expect(sentMessages(socket)).toEqual([
      {
        type: 'run:completed',
        payload: expect.objectContaining({
          runId: 'run-ws-4',
          state: 'FAILED',
          failureReason: 'Build failed with exit code 101',
        }),
      },
    ]);
  });

  it('should forget a disconnected client', () => {
    const socket = createMockSocket();
    handleMessage(socket as unknown as WebSocket, { type: 'subscribe', payload: { channel: 'run:run-ws-5' } });
    socket.send.mockClear();

    removeSubscriber(socket as unknown as WebSocket);
    broadcastStepOutput({ runId: 'run-ws-5', step: 'build', stream: 'stdout', data: 'Compiling\n' });

    expect(socket.send).not.toHaveBeenCalled();
  });
});
