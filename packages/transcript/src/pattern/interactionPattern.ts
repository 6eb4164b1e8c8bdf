import { sha3_256 } from "@noble/hashes/sha3";
import { PatternDeclarationError } from "../errors.js";
import { utf8 } from "../utils/bytes.js";
import type { Interaction } from "./interaction.js";

export type PatternErrorReason = "MissingBegin" | "MismatchedBeginEnd" | "InvalidKind" | "MissingEnd";

function patternError(reason: PatternErrorReason, message: string, details: Record<string, unknown>) {
  return new PatternDeclarationError(message, { reason, ...details });
}

/**
 * A validated, nested list of interactions.
 *
 * Begin/End pairs must match, and atomic interactions inside a group must
 * share the group's kind unless the group is a `Protocol`.
 */
export class InteractionPattern {
  readonly interactions: readonly Interaction[];

  constructor(interactions: readonly Interaction[]) {
    this.interactions = Object.freeze([...interactions]);
    this.validate();
  }

  private validate(): void {
    const stack: Array<{ position: number; begin: Interaction }> = [];
    this.interactions.forEach((interaction, position) => {
      if (interaction.hierarchy === "Begin") {
        stack.push({ position, begin: interaction });
        return;
      }
      const open = stack[stack.length - 1];
      if (interaction.hierarchy === "End") {
        if (!open) {
          throw patternError("MissingBegin", `Missing Begin for ${interaction} at ${position}`, { position });
        }
        if (!interaction.closes(open.begin)) {
          throw patternError(
            "MismatchedBeginEnd",
            `Mismatch ${open.begin} at ${open.position} for ${interaction} at ${position}`,
            { beginPosition: open.position, endPosition: position },
          );
        }
        stack.pop();
        return;
      }
      if (open && open.begin.kind !== "Protocol" && open.begin.kind !== interaction.kind) {
        throw patternError(
          "InvalidKind",
          `Invalid kind ${interaction} at ${position} for ${open.begin} at ${open.position}`,
          { beginPosition: open.position, position },
        );
      }
    });
    const unclosed = stack.pop();
    if (unclosed) {
      throw patternError("MissingEnd", `Missing End for ${unclosed.begin} at ${unclosed.position}`, {
        position: unclosed.position,
      });
    }
  }

  /**
   * Human-readable listing. With `domain` set, uses the stable interaction
   * form suitable for hashing. The header carries the interaction count so no
   * prefix of a listing is itself a valid listing.
   */
  toString(domain = false): string {
    const n = this.interactions.length;
    const width = String(Math.max(n - 1, 0)).length;
    let out = `Interaction Pattern (${n} interactions)\n`;
    let indent = 0;
    this.interactions.forEach((interaction, position) => {
      if (interaction.hierarchy === "End") indent -= 1;
      const text = domain ? interaction.toDomainString() : interaction.toString();
      out += `${String(position).padStart(width, "0")} ${"  ".repeat(indent)}${text}\n`;
      if (interaction.hierarchy === "Begin") indent += 1;
    });
    return out;
  }

  /** SHA3-256 of the domain listing; usable as a sponge IV. */
  patternHash(): Uint8Array {
    return sha3_256(utf8(this.toString(true)));
  }
}
