import { execa } from 'execa';
import { ConfigError, errorMessage, LaunchError } from '../errors/custom-errors.js';
import type { StreamDescriptor } from '../types/anime.types.js';
import { logger } from '../utils/logger.js';
import { buildArgv, type CommandTemplate, parseCommandTemplate } from './command-template.js';

/**
 * Handle to a started player. The launcher does not own its lifecycle.
 */
export type PlayerProcess = {
  pid: number | undefined;
  command: string;
  args: string[];
};

/**
 * Substitute the descriptor into the template and start the player as a
 * detached process. Resolves as soon as the process has been spawned.
 *
 * @throws LaunchError if the template is malformed or the process cannot be spawned
 */
export async function launchPlayer(
  descriptor: StreamDescriptor,
  template: string | CommandTemplate,
): Promise<PlayerProcess> {
  const source = typeof template === 'string' ? template : template.source;

  let argv: string[];
  try {
    const parsed = typeof template === 'string' ? parseCommandTemplate(template) : template;
    argv = buildArgv(parsed, descriptor);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new LaunchError(error.message, source, { cause: error });
    }
    throw error;
  }

  const [command, ...args] = argv;
  if (!command) {
    throw new LaunchError('Player command is empty', source);
  }

  logger.debug(`Starting player: ${argv.join(' ')}`);

  try {
    const subprocess = execa(command, args, {
      detached: true,
      stdio: 'ignore',
      cleanup: false,
    });

    // Settles when the player exits, long after we stopped caring
    subprocess.catch((error: unknown) => {
      logger.debug(`Player process ended: ${errorMessage(error)}`);
    });

    await new Promise<void>((resolve, reject) => {
      subprocess.once('spawn', () => resolve());
      subprocess.once('error', reject);
    });

    subprocess.unref();

    return { pid: subprocess.pid, command, args };
  } catch (error) {
    throw new LaunchError(`Failed to start player "${command}": ${errorMessage(error)}`, source, { cause: error });
  }
}

/**
 * Playback launcher bound to the configured command template
 */
export class PlayerLauncher {
  private readonly template: CommandTemplate;

  /**
   * @throws ConfigError if the template is malformed
   */
  constructor(template: string) {
    this.template = parseCommandTemplate(template);
  }

  getTemplate(): string {
    return this.template.source;
  }

  launch(descriptor: StreamDescriptor): Promise<PlayerProcess> {
    return launchPlayer(descriptor, this.template);
  }
}
