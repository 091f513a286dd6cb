/**
 * Contracts between the sync engines and the per-tracker integrations
 */

import { Status } from '../model/operation';

/** A person or bot as the tracker reports it */
export interface RemoteActor {
  login: string;
  name?: string;
  email?: string;
  avatarUrl?: string;
}

/**
 * One version of a text body. The first edit of a sequence is the creation
 * itself; `body: null` means the text was deleted.
 */
export interface RemoteEdit {
  id: string;
  editor: RemoteActor | null;
  createdAt: Date;
  body: string | null;
}

interface RemoteEventBase {
  id: string;
  actor: RemoteActor | null;
  createdAt: Date;
}

export interface RemoteCommentEvent extends RemoteEventBase {
  kind: 'comment';
  url: string;
  /** Current text */
  body: string;
  updatedAt: Date;
  /** Edit history, creation first; empty when the tracker keeps none */
  edits: RemoteEdit[];
}

export interface RemoteStatusEvent extends RemoteEventBase {
  kind: 'status-change';
  status: Status;
}

export interface RemoteLabelEvent extends RemoteEventBase {
  kind: 'label-add' | 'label-remove';
  label: string;
}

export interface RemoteTitleEvent extends RemoteEventBase {
  kind: 'title-change';
  title: string;
}

/**
 * The item's description changed. Trackers that keep no edit history report
 * only the current text, so the engine compares it with what it has.
 */
export interface RemoteDescriptionEvent extends RemoteEventBase {
  kind: 'description-change';
  body: string;
}

export interface RemoteUnsupportedEvent extends RemoteEventBase {
  kind: 'unsupported';
  type: string;
}

export type RemoteEvent =
  | RemoteCommentEvent
  | RemoteStatusEvent
  | RemoteLabelEvent
  | RemoteTitleEvent
  | RemoteDescriptionEvent
  | RemoteUnsupportedEvent;

export interface RemoteItem {
  /** Stable id on the tracker */
  id: string;
  /** Canonical URL on the tracker */
  url: string;
  author: RemoteActor | null;
  title: string;
  body: string;
  createdAt: Date;
  updatedAt: Date;
  /** Body edit history, creation first; empty when the tracker keeps none */
  edits: RemoteEdit[];
  /**
   * Set when the tracker itself reports that the item has no history, which
   * is the only case where an empty event sequence is acceptable.
   */
  knownEmpty: boolean;
  /** Lazy, ordered events of the item */
  events(): AsyncIterable<RemoteEvent>;
}

/**
 * Lazy sequence of top-level items of one tracker. A thrown error is a
 * transport failure; normal completion means exhaustion.
 */
export interface SourceIterator {
  readonly target: string;
  /** Items changed at or after `since`, in tracker order */
  items(since?: Date): AsyncIterable<RemoteItem>;
}

export interface RemoteRef {
  id: string;
  url: string;
}

/**
 * Write side of a tracker, used by the export engine
 */
export interface RemoteWriter {
  readonly target: string;
  createIssue(title: string, body: string): Promise<RemoteRef>;
  editIssueBody(issue: RemoteRef, body: string): Promise<void>;
  addComment(issue: RemoteRef, body: string): Promise<RemoteRef>;
  editComment(issue: RemoteRef, commentId: string, body: string): Promise<void>;
  setTitle(issue: RemoteRef, title: string): Promise<void>;
  setStatus(issue: RemoteRef, status: Status): Promise<void>;
  changeLabels(issue: RemoteRef, added: string[], removed: string[]): Promise<void>;
}
