import { useEffect, useState } from "react";
import type { MonitorSession, SearchState, Snapshot } from "@blocktop/monitor-core";

export type SessionView = {
  snapshot: Snapshot;
  search: SearchState;
};

function readView(session: MonitorSession): SessionView {
  return { snapshot: session.readSnapshot(), search: session.readSearch() };
}

/** Re-reads the session on every redraw notification. */
export function useSessionView(session: MonitorSession): SessionView {
  const [view, setView] = useState(() => readView(session));
  useEffect(() => {
    setView(readView(session));
    return session.subscribe(() => setView(readView(session)));
  }, [session]);
  return view;
}
