/**
 * Compose progress of an authenticated session. A message can be submitted
 * only from `have-subject`.
 */
export type ComposeState =
  | { stage: 'empty' }
  | { stage: 'have-recipient'; to: string }
  | { stage: 'have-subject'; to: string; subject: string };

export type ComposeEvent = { kind: 'recipient'; to: string } | { kind: 'subject'; subject: string } | { kind: 'clear' };

export const EMPTY_COMPOSE: ComposeState = { stage: 'empty' };

/**
 * Returns the next compose state, or undefined when the event is not allowed
 * in the current one. A new recipient keeps an already set subject.
 */
export function nextComposeState(state: ComposeState, event: ComposeEvent): ComposeState | undefined {
  switch (event.kind) {
    case 'recipient':
      return state.stage === 'have-subject'
        ? { stage: 'have-subject', to: event.to, subject: state.subject }
        : { stage: 'have-recipient', to: event.to };
    case 'subject':
      return state.stage === 'empty' ? undefined : { stage: 'have-subject', to: state.to, subject: event.subject };
    case 'clear':
      return EMPTY_COMPOSE;
  }
}
