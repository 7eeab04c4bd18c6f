/** What a keypress asks the terminal host to do. */
export type TerminalIntent = 'toggle' | 'add' | 'remove' | 'reset' | 'switch' | 'countdown' | 'quit';

/** Subset of the readline keypress descriptor we look at. */
export interface KeyInfo {
  name?: string;
  ctrl?: boolean;
}

export function intentForKey(input: string | undefined, key: KeyInfo | undefined): TerminalIntent | null {
  if (key?.ctrl && key.name === 'c') return 'quit';
  switch (key?.name ?? input) {
    case 'space':
    case 'return':
      return 'toggle';
    case 'r':
      return 'reset';
    case 'p':
      return 'switch';
    case 'c':
      return 'countdown';
    case 'q':
    case 'escape':
      return 'quit';
  }
  switch (input) {
    case '+':
    case '=':
      return 'add';
    case '-':
    case '_':
      return 'remove';
    default:
      return null;
  }
}
