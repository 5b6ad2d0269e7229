/**
 * Explicit registration of command handlers for the host's command layer
 *
 * The host parses input and dispatches; this registry only answers which handler
 * owns a label. Labels (names and aliases) are matched case-insensitively and
 * may belong to one command only.
 */

import { DuplicateCommandError } from "./errors.js";

export interface RegisteredCommand<C> {
  name: string;
  aliases?: string[];
  /** Grants required to run the command; the host enforces them */
  permissions?: string[];
  description?: string;
  execute(context: C, args: string[]): boolean | Promise<boolean>;
}

export class CommandRegistry<C> {
  #commands: RegisteredCommand<C>[] = [];
  #byLabel = new Map<string, RegisteredCommand<C>>();

  /**
   * @throws DuplicateCommandError if the name or an alias is already taken
   */
  register(command: RegisteredCommand<C>): void {
    const labels = [command.name, ...(command.aliases ?? [])].map((label) => label.toLowerCase());

    const seen = new Set<string>();
    for (const label of labels) {
      if (this.#byLabel.has(label) || seen.has(label)) {
        throw new DuplicateCommandError(label);
      }
      seen.add(label);
    }

    for (const label of labels) {
      this.#byLabel.set(label, command);
    }
    this.#commands.push(command);
  }

  find(label: string): RegisteredCommand<C> | undefined {
    return this.#byLabel.get(label.toLowerCase());
  }

  /**
   * Commands in registration order
   */
  list(): readonly RegisteredCommand<C>[] {
    return [...this.#commands];
  }

  /**
   * Labels starting with a prefix, for tab completion
   */
  complete(prefix: string): string[] {
    const wanted = prefix.toLowerCase();
    return Array.from(this.#byLabel.keys())
      .filter((label) => label.startsWith(wanted))
      .sort();
  }
}
