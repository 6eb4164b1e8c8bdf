import { Interaction, Length } from "./interaction.js";
import type { Kind } from "./interaction.js";

/**
 * Group-level operations shared by the pattern recorder and the player.
 * Atomic interactions go through `interact` directly.
 */
export abstract class HierarchicalPattern {
  abstract interact(interaction: Interaction): void;

  /** Ends the session without the completeness check. */
  abstract abort(): void;

  begin(label: string, kind: Kind, length: Length, typeName = ""): void {
    this.interact(new Interaction("Begin", kind, label, length, typeName));
  }

  end(label: string, kind: Kind, length: Length, typeName = ""): void {
    this.interact(new Interaction("End", kind, label, length, typeName));
  }

  beginProtocol(label: string): void {
    this.begin(label, "Protocol", Length.None);
  }

  endProtocol(label: string): void {
    this.end(label, "Protocol", Length.None);
  }

  beginPublic(label: string, length: Length): void {
    this.begin(label, "Public", length);
  }

  endPublic(label: string, length: Length): void {
    this.end(label, "Public", length);
  }

  beginMessage(label: string, length: Length): void {
    this.begin(label, "Message", length);
  }

  endMessage(label: string, length: Length): void {
    this.end(label, "Message", length);
  }

  beginHint(label: string, length: Length): void {
    this.begin(label, "Hint", length);
  }

  endHint(label: string, length: Length): void {
    this.end(label, "Hint", length);
  }

  beginChallenge(label: string, length: Length): void {
    this.begin(label, "Challenge", length);
  }

  endChallenge(label: string, length: Length): void {
    this.end(label, "Challenge", length);
  }
}
