// Path: src/commands/types.ts
// Type definitions for Commander.js command options

/**
 * Options for the 'install' command
 */
export interface InstallCommandOptions {
  port?: number;
  /** Use --port as given even when it is below 1024 or already bound */
  fixed?: boolean;
  sni?: string;
  /** Plain VLESS without Reality */
  reality?: boolean;
  json?: boolean;
}

/**
 * Options for commands that ask before destroying state
 */
export interface ConfirmCommandOptions {
  yes?: boolean;
}

export interface UninstallCommandOptions extends ConfirmCommandOptions {
  json?: boolean;
}

export interface RotateCommandOptions extends ConfirmCommandOptions {
  json?: boolean;
}

/**
 * Options for the 'user add' command
 */
export interface UserAddCommandOptions {
  id?: string;
  qr?: boolean;
  json?: boolean;
}

/**
 * Options for the 'user edit' command
 */
export interface UserEditCommandOptions {
  name?: string;
  id?: string;
  json?: boolean;
}

export interface UserShowCommandOptions {
  qr?: boolean;
  json?: boolean;
}

export interface JsonCommandOptions {
  json?: boolean;
}

/**
 * Options for the 'heal' command
 */
export interface HealCommandOptions extends ConfirmCommandOptions {
  allowDelete?: boolean;
  json?: boolean;
}

/**
 * Options for the 'serve' command
 */
export interface ServeCommandOptions {
  port?: number;
  host: string;
}
