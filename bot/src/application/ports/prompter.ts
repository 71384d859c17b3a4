import type { NoticeField } from './notifier.js';

export interface PromptChoice<T> {
  label: string;
  value: T;
}

export interface ChooseRequest<T> {
  message: string;
  choices: PromptChoice<T>[];
  fields?: NoticeField[];
  placeholder?: string;
}

export interface ConfirmRequest {
  message: string;
  confirmLabel?: string;
  cancelLabel?: string;
}

/**
 * How an interactive prompt ended. `cancelled` means the user pressed the
 * cancel control; `timedOut` means nobody answered before the deadline.
 */
export type PromptOutcome<T> =
  | { status: 'selected'; value: T }
  | { status: 'cancelled' }
  | { status: 'timedOut' };

/**
 * Prompter Port
 * Asks the invoking user a question. Only that user may answer, and every
 * prompt is bounded by the prompter's deadline.
 */
export interface Prompter {
  choose<T>(request: ChooseRequest<T>): Promise<PromptOutcome<T>>;
  /** Resolves `selected` with true for confirm and false for cancel. */
  confirm(request: ConfirmRequest): Promise<PromptOutcome<boolean>>;
}
