import type { InboundMessage, Logger } from "@goodname/chat-core";
import { resolveAction, type ActionHandlers, type ActionKind, type BotAction } from "./actions.js";
import { ConfigError, type TriggerConfig } from "./config.js";

export interface TriggerBinding {
  /** Pattern as written in the config */
  trigger: string;
  pattern: RegExp;
  action: BotAction;
}

export interface DispatchOutcome {
  trigger: string;
  action: string;
  kind: ActionKind;
  /** False when the handler threw */
  ok: boolean;
}

export interface DispatchRegistryOptions {
  triggers: TriggerConfig[];
  handlers: ActionHandlers;
  logger: Logger;
}

/**
 * Compile a trigger: case-insensitive, anchored at the start of the line.
 */
export function compileTrigger(trigger: string): RegExp {
  try {
    return new RegExp(`^(?:${trigger})`, "i");
  } catch (err) {
    throw new ConfigError(`Invalid trigger pattern: ${trigger}`, { cause: err });
  }
}

/**
 * DispatchRegistry: ordered (pattern → action) bindings.
 *
 * Every binding is evaluated against every line, and every match fires,
 * in registration order. A handler that throws is logged and skipped; the
 * remaining bindings still run.
 */
export class DispatchRegistry {
  readonly bindings: readonly TriggerBinding[];
  private handlers: ActionHandlers;
  private logger: Logger;

  constructor(options: DispatchRegistryOptions) {
    this.handlers = options.handlers;
    this.logger = options.logger.child({ component: "DispatchRegistry" });
    this.bindings = options.triggers.map(({ trigger, action }) => ({
      trigger,
      pattern: compileTrigger(trigger),
      action: resolveAction(action),
    }));

    for (const binding of this.bindings) {
      if (binding.action.kind === "missing") {
        this.logger.warn(
          { trigger: binding.trigger, action: binding.action.name },
          "Unknown action, binding will only log",
        );
      }
    }
  }

  async dispatch(message: InboundMessage): Promise<DispatchOutcome[]> {
    const line = message.text.trim();
    const outcomes: DispatchOutcome[] = [];

    for (const binding of this.bindings) {
      const match = binding.pattern.exec(line);
      if (!match) continue;

      const outcome: DispatchOutcome = {
        trigger: binding.trigger,
        action: binding.action.name,
        kind: binding.action.kind,
        ok: true,
      };

      try {
        await this.handlers[binding.action.kind]({
          message,
          groups: match.slice(1).map((group) => group ?? ""),
          trigger: binding.trigger,
          action: binding.action,
        });
      } catch (err) {
        outcome.ok = false;
        this.logger.error(
          { err, trigger: binding.trigger, action: binding.action.name },
          "Action failed",
        );
      }

      outcomes.push(outcome);
    }

    return outcomes;
  }
}
