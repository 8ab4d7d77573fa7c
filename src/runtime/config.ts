/**
 * Configuration surface: command-line options and environment variables that
 * the runtime and the active exporters declare.
 */

import { Command, Option } from 'commander';

export interface EnvironmentVariable {
  name: string;
  description: string;
}

export type OptionValue = string | boolean;

export interface ProgramParameters {
  /** Declared options that were present on the command line, keyed by attribute name. */
  options: Record<string, OptionValue>;
  /** Declared environment variables that were set. */
  environment: Record<string, string>;
}

export class ConfigSurface {
  private readonly command: Command;
  private readonly variables: EnvironmentVariable[] = [];

  constructor(programName = 'program') {
    this.command = new Command(programName)
      .helpOption(false)
      .allowUnknownOption(true)
      .allowExcessArguments(true)
      .exitOverride()
      .configureOutput({ writeOut: () => {}, writeErr: () => {} });
  }

  /**
   * Declare an option in commander syntax, e.g. `--dataset [name]`. Declaring
   * the value as optional lets setup code tell "absent" from "given empty".
   */
  appendOption(flags: string, description: string): this {
    this.command.addOption(new Option(flags, description));
    return this;
  }

  appendVariable(name: string, description: string): this {
    this.variables.push({ name, description });
    return this;
  }

  listOptions(): Array<{ flags: string; description: string }> {
    return this.command.options.map(o => ({ flags: o.flags, description: o.description }));
  }

  listVariables(): readonly EnvironmentVariable[] {
    return this.variables;
  }

  /**
   * Parse `argv` (user arguments only, without the node binary and script)
   * against the declared options. Unknown options belong to the application
   * and are left alone.
   *
   * @throws CommanderError when a declared option is malformed
   */
  resolve(argv: readonly string[], env: Readonly<Record<string, string | undefined>>): ProgramParameters {
    this.command.parse([...argv], { from: 'user' });

    const options: Record<string, OptionValue> = {};
    for (const [key, value] of Object.entries(this.command.opts())) {
      if (typeof value === 'string' || typeof value === 'boolean') options[key] = value;
    }

    const environment: Record<string, string> = {};
    for (const { name } of this.variables) {
      const value = env[name];
      if (value !== undefined) environment[name] = value;
    }

    return { options, environment };
  }
}
