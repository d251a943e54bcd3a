import * as readline from "node:readline";
import type { Prompter } from "../generator/collaborators.js";

/** Asks on the terminal. An empty answer, "y" or "yes" counts as yes; closed input counts as no. */
export class ReadlinePrompter implements Prompter {
   constructor(
      private input: NodeJS.ReadableStream = process.stdin,
      private output: NodeJS.WritableStream = process.stdout
   ) { }

   public yes(question: string): Promise<boolean> {
      const rl = readline.createInterface({ input: this.input, output: this.output });
      return new Promise(resolve => {
         // EOF before an answer: treat as declined
         rl.once("close", () => resolve(false));
         rl.question(`${question} [Yn] `, answer => {
            resolve(/^\s*(y|yes)?\s*$/i.test(answer));
            rl.close();
         });
      });
   }
}

/** Always answers the same way (`--yes`, non-interactive runs). */
export class AutoPrompter implements Prompter {
   public readonly asked: string[] = [];

   constructor(private answer: boolean) { }

   public yes(question: string): Promise<boolean> {
      this.asked.push(question);
      return Promise.resolve(this.answer);
   }
}
