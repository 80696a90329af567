import type { Session } from "../entities/Session.js";
import type { BroadcastHub } from "../ports/BroadcastHub.js";

export async function publishSnapshot(hub: BroadcastHub, session: Session): Promise<void> {
  await hub.broadcast(session.id, { action: "update_state", state: session.snapshot() });
}
