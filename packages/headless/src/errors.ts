export type ScriptErrorCode = 'BadArgument' | 'BadScript' | 'UnknownCommand' | 'MissingFile';

export class ScriptError extends Error {
  constructor(public readonly code: ScriptErrorCode, public readonly detail: string) {
    super(`${code}: ${detail}`);
    this.name = 'ScriptError';
  }
}
