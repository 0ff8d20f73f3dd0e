/**
 * Terminal output types
 */

export type SemanticColor = 'error' | 'warning' | 'info' | 'primary' | 'command';

export interface TableOptions {
  head?: string[];
  style?: 'unicode' | 'ascii';
}

/** Progress shown on stderr while an external tool runs */
export interface SpinnerController {
  update: (text: string) => void;
  stop: () => void;
}
