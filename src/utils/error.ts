import { SubprocessFailureError, WorkbenchError } from '../types';

function detailString(error: WorkbenchError, key: string): string {
  const value = error.details?.[key];
  return typeof value === 'string' ? value.trim() : '';
}

// Format error for the terminal
export function formatError(error: unknown): string {
  if (error instanceof WorkbenchError) {
    let message = `${error.code}: ${error.message}`;

    const command = detailString(error, 'command');
    if (command) {
      message += `\n${command}`;
    }

    const stdout = detailString(error, 'stdout');
    if (stdout) {
      message += `\n\nstdout:\n${stdout}`;
    }

    const stderr = detailString(error, 'stderr');
    if (stderr) {
      message += `\n\nstderr:\n${stderr}`;
    }

    if (error.suggestion) {
      message += `\n\nSuggestion: ${error.suggestion}`;
    }

    return message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

// A non-zero exit is a warning; everything else is an error
export function isWarning(error: unknown): boolean {
  return error instanceof SubprocessFailureError;
}
