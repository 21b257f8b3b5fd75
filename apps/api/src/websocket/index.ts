/**
 * WebSocket Handlers
 */

import type { FastifyInstance } from 'fastify';
import type { SocketStream } from '@fastify/websocket';
import type { WebSocket } from 'ws';
import { z } from 'zod';
import { createChildLogger, type PipelineRun, type StepOutputChunk } from '@pipewright/shared';
import type { StateChange } from '@pipewright/core';

const logger = createChildLogger({ component: 'WebSocket' });

const clientMessageSchema = z.object({
  type: z.string(),
  payload: z.object({ channel: z.string().min(1).optional() }).optional(),
});

type ClientMessage = z.infer<typeof clientMessageSchema>;

// Store channel subscriptions: channel -> Set of clients
const subscriptions = new Map<string, Set<WebSocket>>();

export async function registerWebSocket(app: FastifyInstance): Promise<void> {
  app.get('/ws', { websocket: true }, (connection: SocketStream, req) => {
    const socket = connection.socket;
    logger.info({ ip: req.ip }, 'WebSocket client connected');

    socket.on('message', (message) => {
      let data: unknown;
      try {
        data = JSON.parse(message.toString());
      } catch {
        logger.warn('Invalid WebSocket message: not JSON');
        return;
      }
      const parsed = clientMessageSchema.safeParse(data);
      if (!parsed.success) {
        logger.warn('Invalid WebSocket message: missing type');
        return;
      }
      handleMessage(socket, parsed.data);
    });

    socket.on('close', () => {
      removeSubscriber(socket);
      logger.info('WebSocket client disconnected');
    });

    socket.on('error', (err) => {
      logger.error({ error: err.message }, 'WebSocket error');
      removeSubscriber(socket);
    });

    // Send welcome message
    socket.send(
      JSON.stringify({
        type: 'connected',
        timestamp: new Date().toISOString(),
      })
    );
  });
}

/**
 * Handle incoming WebSocket messages
 */
export function handleMessage(socket: WebSocket, data: ClientMessage): void {
  switch (data.type) {
    case 'ping':
      socket.send(JSON.stringify({ type: 'pong', timestamp: new Date().toISOString() }));
      break;

    case 'subscribe': {
      const channel = data.payload?.channel;
      if (channel) {
        const subs = subscriptions.get(channel) ?? new Set<WebSocket>();
        subs.add(socket);
        subscriptions.set(channel, subs);
        logger.info({ channel }, 'Client subscribed to channel');
        socket.send(JSON.stringify({ type: 'subscribed', channel, timestamp: new Date().toISOString() }));
      } else {
        socket.send(JSON.stringify({ type: 'error', message: 'Channel required for subscription' }));
      }
      break;
    }

    case 'unsubscribe': {
      const channel = data.payload?.channel;
      const subs = channel ? subscriptions.get(channel) : undefined;
      if (channel && subs) {
        subs.delete(socket);
        if (subs.size === 0) {
          subscriptions.delete(channel);
        }
        logger.info({ channel }, 'Client unsubscribed from channel');
        socket.send(JSON.stringify({ type: 'unsubscribed', channel, timestamp: new Date().toISOString() }));
      }
      break;
    }

    default:
      logger.warn({ type: data.type }, 'Unknown message type');
  }
}

/**
 * Drop a socket from every channel it subscribed to
 */
export function removeSubscriber(socket: WebSocket): void {
  for (const [channel, subs] of subscriptions.entries()) {
    subs.delete(socket);
    if (subs.size === 0) {
      subscriptions.delete(channel);
    }
  }
}

/**
 * Send a message to the clients subscribed to a channel; nobody else receives it
 */
export function broadcastToChannel(channel: string, message: { type: string; payload: unknown }): void {
  const channelClients = subscriptions.get(channel);
  if (!channelClients) return;

  const data = JSON.stringify(message);
  for (const client of channelClients) {
    if (client.readyState === 1) {
      // OPEN
      client.send(data);
    }
  }
}

/**
 * Broadcast a run state change
 */
export function broadcastRunState(run: PipelineRun, change: StateChange): void {
  const message = {
    type: 'run:state',
    payload: {
      runId: run.id,
      from: change.from,
      to: change.to,
      reason: change.reason,
      timestamp: change.at.toISOString(),
    },
  };
  broadcastToChannel(`run:${run.id}`, message);
}

/**
 * Stream step output to run subscribers
 */
export function broadcastStepOutput(chunk: StepOutputChunk): void {
  broadcastToChannel(`run:${chunk.runId}`, { type: 'step:output', payload: chunk });
}

/**
 * Broadcast run completion
 */
export function broadcastRunCompleted(run: PipelineRun): void {
  const message = {
    type: 'run:completed',
    payload: {
      runId: run.id,
      state: run.state,
      failureReason: run.failureReason,
      cacheKey: run.cacheKey,
      durationMs: run.durationMs,
      timestamp: new Date().toISOString(),
    },
  };
  broadcastToChannel(`run:${run.id}`, message);
}
