/**
 * Progress listener that prints phase changes to the console.
 */
import type { ProgressListener } from './types/collaborators.js';
import type { SequencerState } from './types/sequencer-state.js';

export class ConsoleProgressListener implements ProgressListener {
  onPhaseChanged(phase: SequencerState, current: number, total: number): void {
    const position = total > 0 ? ` [${current}/${total}]` : '';
    console.log(`→ ${phase}${position}`);
  }
}
