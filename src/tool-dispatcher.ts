import { errorMessage } from './errors.js';
import { DEFAULT_EXCLUDED_DIRS, isExcludedPath } from './file-system.js';
import { silentLogger, type Logger } from './logger.js';
import { MutationTracker, normalizePath } from './mutation-tracker.js';
import { PAYLOAD_CLOSE, PAYLOAD_OPEN } from './protocol-parser.js';
import type { DispatchableCommand, FileSystem, ParseError } from './types.js';

export const NO_TOOL_COMMAND =
  'No tool command found. Start your reply with one of READ_FILE, WRITE_FILE, LIST_FILES or DONE.';

export interface ToolDispatcherOptions {
  excludeDirs?: readonly string[];
  logger?: Logger;
}

/**
 * Executes tool commands against the file system and turns every result,
 * failures included, into observation text for the model
 */
export class ToolDispatcher {
  private excludeDirs: readonly string[];
  private logger: Logger;

  constructor(
    private readonly fs: FileSystem,
    private readonly tracker: MutationTracker,
    options: ToolDispatcherOptions = {}
  ) {
    this.excludeDirs = options.excludeDirs ?? DEFAULT_EXCLUDED_DIRS;
    this.logger = options.logger ?? silentLogger;
  }

  async dispatch(command: DispatchableCommand): Promise<string> {
    switch (command.type) {
      case 'ReadFile':
        this.logger.debug(`  ⎿  READ_FILE ${command.path}`);
        return this.readFile(command.path);
      case 'WriteFile':
        this.logger.debug(`  ⎿  WRITE_FILE ${command.path}`);
        return this.writeFile(command.path, command.content);
      case 'ListFiles':
        this.logger.debug(`  ⎿  LIST_FILES ${command.path}`);
        return this.listFiles(command.path);
      case 'Unrecognized':
        this.logger.warn('  ⎿  No tool command in reply');
        return NO_TOOL_COMMAND;
    }
  }

  /**
   * Observation for a reply that named a command but could not be decoded
   */
  describeParseError(error: ParseError): string {
    this.logger.warn(`  ⎿  ${error.type} (${error.keyword})`);
    if (error.type === 'MissingArgument') {
      return `Error: ${error.keyword} requires a path argument on the same line.`;
    }
    return `Error: Invalid ${error.keyword} format. Use ${PAYLOAD_OPEN} and ${PAYLOAD_CLOSE}`;
  }

  private async readFile(path: string): Promise<string> {
    try {
      return await this.fs.read(path);
    } catch (error) {
      return `Error reading file ${path}: ${errorMessage(error)}`;
    }
  }

  private async writeFile(path: string, content: string): Promise<string> {
    try {
      await this.tracker.record(path);
      await this.fs.write(path, content);
      return `Successfully wrote to ${path}`;
    } catch (error) {
      return `Error writing file ${path}: ${errorMessage(error)}`;
    }
  }

  private async listFiles(path: string): Promise<string> {
    try {
      const files = (await this.fs.list(path, { excludeDirs: this.excludeDirs }))
        .map(normalizePath)
        .filter((file) => !isExcludedPath(file, this.excludeDirs))
        .sort();
      return files.length > 0 ? files.join('\n') : `No files found in ${path}`;
    } catch (error) {
      return `Error listing files: ${errorMessage(error)}`;
    }
  }
}
