// Completion events delivered to request trackers

import { Node, Request } from '../request/types';

interface CompletionBase {
  request: Request;
  /** Time from request start to completion, in nanoseconds */
  latencyNanos: number;
}

/** The request completed successfully */
export interface SuccessEvent extends CompletionBase {
  kind: 'success';
  node: Node;
}

/** The request failed; node is absent when no node was ever contacted */
export interface ErrorEvent extends CompletionBase {
  kind: 'error';
  node?: Node;
  error: Error;
}

/** One node answered one execution of the request */
export interface NodeSuccessEvent extends CompletionBase {
  kind: 'nodeSuccess';
  node: Node;
}

/** One node failed one execution of the request; the request may still succeed elsewhere */
export interface NodeErrorEvent extends CompletionBase {
  kind: 'nodeError';
  node: Node;
  error: Error;
}

export type RequestCompletionEvent = SuccessEvent | ErrorEvent;
export type NodeCompletionEvent = NodeSuccessEvent | NodeErrorEvent;
export type CompletionEvent = RequestCompletionEvent | NodeCompletionEvent;
