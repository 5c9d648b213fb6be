export type SendFn = (text: string) => void;

/** Where a mode writes what the user sees */
export interface ModeIO {
  send: SendFn;
  sendError: SendFn;
}
