import { PatternDeclarationError } from "../errors.js";
import type { Interaction } from "./interaction.js";
import { InteractionPattern } from "./interactionPattern.js";
import { HierarchicalPattern } from "./pattern.js";

/** Records interactions into an {@link InteractionPattern}, checking nesting as it goes. */
export class PatternState extends HierarchicalPattern {
  private readonly interactions: Interaction[] = [];
  private finalized = false;

  interact(interaction: Interaction): void {
    this.assertOpen();
    const begin = this.lastOpenBegin();
    if (begin) {
      if (begin.kind !== "Protocol" && begin.kind !== interaction.kind) {
        throw new PatternDeclarationError(`Invalid interaction kind: expected ${begin.kind}, got ${interaction.kind}`, {
          reason: "InvalidKind",
        });
      }
      if (interaction.hierarchy === "End" && !interaction.closes(begin)) {
        throw new PatternDeclarationError(`Mismatched begin and end: ${begin}, ${interaction}`, {
          reason: "MismatchedBeginEnd",
        });
      }
    } else if (interaction.hierarchy === "End") {
      throw new PatternDeclarationError(`Missing begin for ${interaction}`, { reason: "MissingBegin" });
    }
    this.interactions.push(interaction);
  }

  abort(): void {
    this.assertOpen();
    this.finalized = true;
  }

  finalize(): InteractionPattern {
    this.assertOpen();
    this.finalized = true;
    return new InteractionPattern(this.interactions);
  }

  private assertOpen(): void {
    if (this.finalized) throw new PatternDeclarationError("pattern already finalized");
  }

  private lastOpenBegin(): Interaction | undefined {
    let depth = 0;
    for (let i = this.interactions.length - 1; i >= 0; i--) {
      const interaction = this.interactions[i];
      if (interaction.hierarchy === "End") depth += 1;
      if (interaction.hierarchy === "Begin") {
        if (depth === 0) return interaction;
        depth -= 1;
      }
    }
    return undefined;
  }
}
