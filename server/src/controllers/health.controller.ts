/**
 * Liveness Endpoint (/healthz)
 * Returns 200 while the process can serve requests; no upstream checks
 */

import type { Request, Response } from 'express';
import type { ChatSessionRegistry } from '../services/chat/chat-session.registry.js';

export function createLivenessHandler(registry: ChatSessionRegistry) {
  return (_req: Request, res: Response): void => {
    res.status(200).json({
      status: 'UP',
      timestamp: new Date().toISOString(),
      sessions: registry.size,
    });
  };
}
