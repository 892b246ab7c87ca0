export class RuntimeCommandError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(`${command} exited with code ${exitCode}${stderr.trim() ? `: ${stderr.trim()}` : ''}`);
    this.name = 'RuntimeCommandError';
  }
}

export class ContainerNotFoundError extends RuntimeCommandError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string,
    readonly containerName: string,
  ) {
    super(command, exitCode, stderr);
    this.name = 'ContainerNotFoundError';
  }
}

export class CommandCancelledError extends Error {
  constructor(readonly command: string) {
    super(`${command} was cancelled`);
    this.name = 'CommandCancelledError';
  }
}

const NOT_FOUND_PATTERN = /no such container/i;

export function isNotFoundOutput(stderr: string): boolean {
  return NOT_FOUND_PATTERN.test(stderr);
}
