export interface BookOpenStartEvent {
  type: 'book:open:start';
  inputFile: string;
}

export interface BookOpenCompleteEvent {
  type: 'book:open:complete';
  title: string;
  totalChapters: number;
}

export interface ChapterLoadEvent {
  type: 'chapter:load';
  index: number;
  url: string;
  initialOffset: number;
}

export interface SessionLoadEvent {
  type: 'session:load';
  sessionFile: string;
  found: boolean;
}

export interface PageChangeEvent {
  type: 'page:change';
  from: number;
  to: number;
}

export interface MarkSetEvent {
  type: 'mark:set';
  chapter: number;
  line: number;
}

export interface WidthChangeEvent {
  type: 'width:change';
  width: number;
}

export interface SessionSaveEvent {
  type: 'session:save';
  sessionFile: string;
  page: number;
}

export interface SessionSaveFailedEvent {
  type: 'session:save:failed';
  sessionFile: string;
  error: unknown;
}

export type ReaderEvent =
  | BookOpenStartEvent
  | BookOpenCompleteEvent
  | ChapterLoadEvent
  | SessionLoadEvent
  | PageChangeEvent
  | MarkSetEvent
  | WidthChangeEvent
  | SessionSaveEvent
  | SessionSaveFailedEvent;

export type EventListener = (event: ReaderEvent) => void;
