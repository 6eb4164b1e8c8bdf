import { ProtocolMismatchError } from "../errors.js";
import type { Interaction } from "./interaction.js";
import type { InteractionPattern } from "./interactionPattern.js";
import { HierarchicalPattern } from "./pattern.js";

/**
 * Plays back an {@link InteractionPattern}; every interaction must equal the
 * next one recorded. The first deviation ends playback.
 */
export class PatternPlayer extends HierarchicalPattern {
  readonly pattern: InteractionPattern;
  private position = 0;
  private finalized = false;

  constructor(pattern: InteractionPattern) {
    super();
    this.pattern = pattern;
  }

  get isComplete(): boolean {
    return this.position >= this.pattern.interactions.length;
  }

  interact(interaction: Interaction): void {
    this.assertOpen();
    const expected = this.pattern.interactions[this.position];
    if (!expected) {
      this.finalized = true;
      throw new ProtocolMismatchError(`Received interaction, but no more expected interactions: ${interaction}`, {
        position: this.position,
      });
    }
    if (!expected.equals(interaction)) {
      this.finalized = true;
      throw new ProtocolMismatchError(`Received interaction ${interaction}, but expected ${expected}`, {
        position: this.position,
      });
    }
    this.position += 1;
  }

  abort(): void {
    this.assertOpen();
    this.finalized = true;
  }

  finalize(): void {
    this.assertOpen();
    if (!this.isComplete) {
      throw new ProtocolMismatchError(
        `Transcript not finished, expecting ${this.pattern.interactions[this.position]}`,
        { position: this.position },
      );
    }
    this.finalized = true;
  }

  private assertOpen(): void {
    if (this.finalized) throw new ProtocolMismatchError("Transcript is already finalized.");
  }
}
