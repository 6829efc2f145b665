import * as readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { Journal } from "@bidmesh/journal";
import type { QueryResponse } from "@bidmesh/schemas";
import type { Coordinator } from "./coordinator.js";
import { QueryFailedError } from "./coordinator.js";

export type ConsoleCommand =
  | { kind: "bid"; name: string; amount: number }
  | { kind: "query" }
  | { kind: "exit" }
  | { kind: "invalid"; message: string };

const MENU = [
  "",
  "Enter a command:",
  "1 <name> <amount>: Place a bid",
  "2: Query auction status",
  "0: Exit",
].join("\n");

const INTEGER_RE = /^[+-]?\d+$/;

export function parseCommand(line: string): ConsoleCommand {
  const args = line.trim().split(/\s+/).filter(Boolean);
  switch (args[0]) {
    case "1": {
      const [, name, rawAmount] = args;
      if (args.length !== 3 || name === undefined || rawAmount === undefined) {
        return { kind: "invalid", message: "Invalid input. Usage: 1 <name> <amount>" };
      }
      const amount = Number(rawAmount);
      if (!INTEGER_RE.test(rawAmount) || !Number.isSafeInteger(amount)) {
        return { kind: "invalid", message: "Invalid amount. Please enter a valid integer." };
      }
      return { kind: "bid", name, amount };
    }
    case "2":
      return { kind: "query" };
    case "0":
      return { kind: "exit" };
    default:
      return { kind: "invalid", message: "Invalid command. Try again." };
  }
}

export function formatStatus(data: QueryResponse): string {
  const lines = [
    `Status: ${data.status}`,
    data.highest_bidder
      ? `Highest bid: ${data.highest_bid} by ${data.highest_bidder}`
      : `Highest bid: ${data.highest_bid}`,
  ];
  if (data.status === "ended") {
    lines.push(`Winner: ${data.winner || "(no bids)"}`);
  } else {
    lines.push(`Time remaining: ${Math.max(0, data.time_remaining)}s`);
  }
  return lines.join("\n");
}

export interface OperatorConsoleConfig {
  coordinator: Pick<Coordinator, "bid" | "query">;
  input: Readable;
  output: Writable;
  journal?: Journal;
}

/** Line-oriented operator loop over a {@link Coordinator}. Ends on `0` or end of input. */
export class OperatorConsole {
  private coordinator: Pick<Coordinator, "bid" | "query">;
  private input: Readable;
  private output: Writable;
  private journal?: Journal;

  constructor(config: OperatorConsoleConfig) {
    this.coordinator = config.coordinator;
    this.input = config.input;
    this.output = config.output;
    this.journal = config.journal;
  }

  async run(): Promise<void> {
    const rl = readline.createInterface({ input: this.input, terminal: false });
    try {
      this.prompt();
      for await (const line of rl) {
        const command = parseCommand(line);
        if (command.kind === "exit") {
          this.print("Exiting...");
          await this.journal?.tryEmit("console.exit", {});
          return;
        }
        await this.execute(command);
        this.prompt();
      }
      await this.journal?.tryEmit("console.exit", { reason: "end of input" });
    } finally {
      rl.close();
    }
  }

  private async execute(command: Exclude<ConsoleCommand, { kind: "exit" }>): Promise<void> {
    switch (command.kind) {
      case "invalid":
        this.print(command.message);
        return;
      case "bid":
        await this.coordinator.bid(command.name, command.amount);
        this.print("Bid submitted.");
        return;
      case "query":
        try {
          const result = await this.coordinator.query();
          this.print(formatStatus(result.data));
        } catch (err) {
          if (!(err instanceof QueryFailedError)) throw err;
          this.print("Failed to query auction status. See the log for details.");
        }
        return;
    }
  }

  private prompt(): void {
    this.output.write(`${MENU}\n> `);
  }

  private print(message: string): void {
    this.output.write(`${message}\n`);
  }
}
