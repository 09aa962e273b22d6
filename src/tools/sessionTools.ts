import type { ToolCatalogue } from "../mcp/catalogue.js";
import { SessionIdInputSchema } from "../rpc/schemas.js";
import type { SessionSnapshot } from "../sessions/store.js";
import type { ToolContext } from "./context.js";

function serialiseSession(snapshot: SessionSnapshot): Record<string, unknown> {
  return {
    session_id: snapshot.id,
    user_id: snapshot.userId,
    created_at: snapshot.createdAt,
    busy: snapshot.busy,
    turn_count: snapshot.turns.length,
    turns: snapshot.turns,
  };
}

export function registerSessionTools(catalogue: ToolCatalogue, context: ToolContext): void {
  const { sessions } = context;

  catalogue.register(
    {
      name: "get_adk_session",
      title: "Describe session",
      description: "Return the recorded turns of a conversation session.",
      category: "sessions",
    },
    SessionIdInputSchema,
    async (input) => ({ session: serialiseSession(sessions.require(input.session_id)) }),
  );

  catalogue.register(
    {
      name: "delete_adk_session",
      title: "Delete session",
      description: "Forget a conversation session. Fails while a run is using it.",
      category: "sessions",
    },
    SessionIdInputSchema,
    async (input) => {
      const deleted = sessions.delete(input.session_id);
      return { deleted: { session_id: deleted.id, turn_count: deleted.turns.length } };
    },
  );
}
