import type { InboundMessage, Logger } from "@goodname/chat-core";
import type { NameStore } from "@goodname/name-store";

// ── Action variants ──────────────────────────────────────────────────

export type ActionKind = "alert" | "addition" | "missing";

/** A configured action name, resolved once at startup. */
export interface BotAction {
  kind: ActionKind;
  /** Name as written in the config */
  name: string;
}

type KnownActionKind = Exclude<ActionKind, "missing">;

/** Config action name → action kind. */
export const ACTION_NAMES: ReadonlyMap<string, KnownActionKind> = new Map<string, KnownActionKind>([
  ["post_good_name_alert", "alert"],
  ["add_good_name", "addition"],
]);

/** Unknown names resolve to the "missing" action instead of failing. */
export function resolveAction(name: string): BotAction {
  return { kind: ACTION_NAMES.get(name) ?? "missing", name };
}

// ── Handlers ─────────────────────────────────────────────────────────

export interface ActionContext {
  message: InboundMessage;
  /** Capture groups of the trigger match; unmatched groups are "" */
  groups: string[];
  /** Trigger pattern as written in the config */
  trigger: string;
  action: BotAction;
}

export type ActionHandler = (ctx: ActionContext) => Promise<void>;

export type ActionHandlers = Record<ActionKind, ActionHandler>;

/** Anything that can post text to a channel (BotSession). */
export interface MessageSender {
  send(channel: string, text: string): Promise<void>;
}

export interface ActionDeps {
  store: NameStore;
  sender: MessageSender;
  logger: Logger;
}

export function formatAlert(text: string): string {
  return `Good name: ${text}`;
}

export function formatRecorded(text: string): string {
  return `Good name ${text} recorded.`;
}

export function createActionHandlers(deps: ActionDeps): ActionHandlers {
  const { store, sender } = deps;
  const logger = deps.logger.child({ component: "actions" });

  return {
    /** Post a random good name to the channel. */
    async alert({ message }) {
      const entry = store.getRandomEntry();
      if (!entry) {
        logger.debug({ channel: message.channel }, "No good name available for alert");
        return;
      }
      await sender.send(message.channel, formatAlert(entry.text));
    },

    /** Idempotently add the first captured group as a good name. */
    async addition({ message, groups }) {
      logger.debug({ groups }, "Match");
      const result = await store.addEntry(groups[0] ?? "", message.user);
      if (!result.added) {
        logger.debug({ text: result.text, reason: result.reason }, "Good name not added");
        return;
      }
      await sender.send(message.channel, formatRecorded(result.text));
    },

    async missing({ message, trigger, action }) {
      logger.warn(
        { trigger, action: action.name, message },
        "Action defined for pattern did not match any known action",
      );
    },
  };
}
