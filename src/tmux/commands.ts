import type { HostConfig } from '../config/schema.js';
import { SessionNotFoundError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { TmuxManager } from './session.js';

/**
 * Paste buffer name for a session; tmux buffer names avoid ':'.
 */
export function bufferName(session: string): string {
  return `sf-prompt-${session.replace(/:/g, '_')}`;
}

export interface SessionRef {
  key: string;
  // tmux session name
  session: string;
}

/**
 * Higher-level tmux commands for delivering input to a running session.
 */
export class TmuxCommands {
  constructor(private tmux: TmuxManager) {}

  /**
   * Two-step delivery: load the payload into a named buffer, then paste that
   * buffer into the session. Never starts a session.
   */
  async sendPayload(host: HostConfig, session: SessionRef, payload: Buffer): Promise<string> {
    if (!(await this.tmux.hasSession(host, session.session))) {
      throw new SessionNotFoundError(session.key, host.name);
    }

    const buffer = bufferName(session.key);
    await this.tmux.loadBuffer(host, buffer, payload);
    await this.tmux.pasteBuffer(host, buffer, session.session);

    logger.info('Payload delivered', { host: host.name, session: session.key, bytes: payload.length });
    return buffer;
  }
}
