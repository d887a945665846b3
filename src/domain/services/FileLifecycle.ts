import { LifecycleTransitionError } from '../errors.js';

export type LifecycleState =
  | 'DISCOVERED'
  | 'NORMALIZING'
  | 'NORMALIZED'
  | 'VALIDATING'
  | 'ARCHIVED_PROCESSED'
  | 'ARCHIVED_FAILED';

export interface ImportSummary {
  added: number;
  skipped: number;
}

export type LifecycleEvent =
  | { type: 'MARKER_FOUND' }
  | { type: 'MARKER_ABSENT' }
  | { type: 'NORMALIZED'; output: string }
  | { type: 'PROCEED' }
  | { type: 'VALIDATED'; summary: ImportSummary }
  | { type: 'FAILED'; message: string };

export type LifecycleEffect =
  | { kind: 'none' }
  | { kind: 'normalize'; cardLabel: string }
  | { kind: 'proceed' }
  | { kind: 'validate'; output: string }
  | { kind: 'archiveProcessed'; output: string; summary: ImportSummary }
  | { kind: 'archiveFailed'; message: string };

export interface LifecycleSnapshot {
  filename: string;
  state: LifecycleState;
  output?: string;
}

export interface LifecycleStep {
  snapshot: LifecycleSnapshot;
  effect: LifecycleEffect;
}

export const MISSING_HEADER_MESSAGE = 'Normalizer response missing headers';

const terminalStates: ReadonlySet<LifecycleState> = new Set(['ARCHIVED_PROCESSED', 'ARCHIVED_FAILED']);

export const isTerminal = (state: LifecycleState): boolean => terminalStates.has(state);

export const fileStem = (filename: string): string => {
  const dot = filename.lastIndexOf('.');
  return dot > 0 ? filename.slice(0, dot) : filename;
};

/** "Amex_2024-03.csv" -> "amex" */
export const deriveCardLabel = (filename: string): string => fileStem(filename).split('_')[0].toLowerCase();

export const hasDateHeader = (output: string): boolean => {
  const firstLine = output.split(/\r?\n/, 1)[0] ?? '';
  return firstLine.toLowerCase().includes('transaction_date');
};

export const discover = (filename: string): LifecycleSnapshot => ({ filename, state: 'DISCOVERED' });

const fail = (snapshot: LifecycleSnapshot, message: string): LifecycleStep => ({
  snapshot: { filename: snapshot.filename, state: 'ARCHIVED_FAILED' },
  effect: { kind: 'archiveFailed', message },
});

/**
 * Pure transition function for one inbox file. The caller performs the
 * returned effect and feeds the result back in as the next event.
 */
export const advanceLifecycle = (snapshot: LifecycleSnapshot, event: LifecycleEvent): LifecycleStep => {
  if (isTerminal(snapshot.state)) {
    throw new LifecycleTransitionError(snapshot.state, event.type);
  }

  if (event.type === 'FAILED') {
    return fail(snapshot, event.message);
  }

  switch (snapshot.state) {
    case 'DISCOVERED':
      if (event.type === 'MARKER_FOUND') {
        return { snapshot: { ...snapshot, state: 'ARCHIVED_PROCESSED' }, effect: { kind: 'none' } };
      }
      if (event.type === 'MARKER_ABSENT') {
        return {
          snapshot: { ...snapshot, state: 'NORMALIZING' },
          effect: { kind: 'normalize', cardLabel: deriveCardLabel(snapshot.filename) },
        };
      }
      break;

    case 'NORMALIZING':
      if (event.type === 'NORMALIZED') {
        return {
          snapshot: { ...snapshot, state: 'NORMALIZED', output: event.output },
          effect: { kind: 'proceed' },
        };
      }
      break;

    case 'NORMALIZED':
      if (event.type === 'PROCEED') {
        const output = snapshot.output ?? '';
        if (!hasDateHeader(output)) {
          return fail(snapshot, MISSING_HEADER_MESSAGE);
        }
        return { snapshot: { ...snapshot, state: 'VALIDATING' }, effect: { kind: 'validate', output } };
      }
      break;

    case 'VALIDATING':
      if (event.type === 'VALIDATED') {
        const output = snapshot.output ?? '';
        return {
          snapshot: { ...snapshot, state: 'ARCHIVED_PROCESSED' },
          effect: { kind: 'archiveProcessed', output, summary: event.summary },
        };
      }
      break;
  }

  throw new LifecycleTransitionError(snapshot.state, event.type);
};
