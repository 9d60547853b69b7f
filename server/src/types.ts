import type { Session } from './sessions.js';

/** Per-request view of the browser's session; the store owns the real entry */
export interface PanelSession {
  id: string;
  /** The id came from the client's cookie rather than being minted for this request */
  fromClient: boolean;
  data: Session | null;
}

declare global {
  namespace Express {
    interface Request {
      panelSession?: PanelSession;
    }
  }
}
