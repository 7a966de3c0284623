import { ConfigProfile } from '../config/ConfigProfile';
import { CompletionEvent } from './events';

/**
 * Observer of request completions. Called synchronously once per event, from
 * whatever code path delivered the completion, possibly concurrently.
 */
export interface RequestTracker {
  onCompletion(event: CompletionEvent, profile: ConfigProfile): void;
  close(): void;
}
