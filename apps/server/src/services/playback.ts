/**
 * Playback Commands
 *
 * Pass-through of play/pause/stop/seek to the session behind an entity key.
 * The only check made is that the key belongs to a session seen in the
 * latest poll.
 */

import type { PlaybackCommand } from '@marquee/shared';
import type { EmbyFetcher } from './mediaServer/types.js';
import type { SessionIdentityManager } from './sessions/identityManager.js';
import { CommandError, NotFoundError } from '../utils/errors.js';
import { errorMessage, type Logger } from '../utils/logger.js';

export interface PlaybackControllerOptions {
  /** Called after a command is accepted so state is re-read promptly */
  requestRefresh?: () => void;
  logger?: Logger;
}

export class PlaybackController {
  constructor(
    private readonly fetcher: Pick<EmbyFetcher, 'sendPlaystate'>,
    private readonly identity: Pick<SessionIdentityManager, 'sessionIdFor'>,
    private readonly options: PlaybackControllerOptions = {}
  ) {}

  /**
   * @throws NotFoundError when the key is not a current session
   * @throws CommandError when the server could not be told
   */
  async sendCommand(key: string, command: PlaybackCommand): Promise<void> {
    const sessionId = this.identity.sessionIdFor(key);
    if (!sessionId) {
      throw new NotFoundError('Session', key);
    }

    try {
      await this.fetcher.sendPlaystate(sessionId, command);
    } catch (error) {
      this.options.logger?.warn(
        { key, command: command.type, error: errorMessage(error) },
        'Playback command failed'
      );
      throw new CommandError(command.type, errorMessage(error));
    }

    this.options.logger?.info({ key, command: command.type }, 'Playback command sent');
    this.options.requestRefresh?.();
  }
}
