// src/patterns/behavioral.ts
// Behavioral examples: Observer, Strategy, Command, State.

/* ------------------------------ Observer ------------------------------ */

export type Listener<T> = (value: T) => void;

/**
 * Pushes each published value to every current subscription, in subscription
 * order. Subscribing the same listener twice makes two independent subscriptions.
 */
export class Subject<T> {
  private readonly subscriptions = new Set<{ listener: Listener<T> }>();

  /** @returns a function that cancels this subscription only */
  public subscribe(listener: Listener<T>): () => void {
    const subscription = { listener };
    this.subscriptions.add(subscription);
    return () => { this.subscriptions.delete(subscription); };
  }

  public publish(value: T): void {
    // copy: a listener may unsubscribe while we iterate
    for (const { listener } of [...this.subscriptions]) listener(value);
  }

  public get subscriberCount(): number { return this.subscriptions.size; }
}

/* ------------------------------ Strategy ------------------------------ */

export interface PricingStrategy {
  readonly name: string;
  price(subtotal: number): number;
}

export const regularPricing: PricingStrategy = {
  name: "regular",
  price: (subtotal) => subtotal,
};

export function percentOff(percent: number): PricingStrategy {
  if (percent < 0 || percent > 100) throw new Error(`Discount must be within 0..100, got ${percent}`);
  return { name: `${percent}% off`, price: (subtotal) => subtotal * (1 - percent / 100) };
}

/** Spend at least `threshold` and `amount` comes off, never below zero. */
export function amountOffOver(threshold: number, amount: number): PricingStrategy {
  return {
    name: `${amount} off over ${threshold}`,
    price: (subtotal) => (subtotal >= threshold ? Math.max(0, subtotal - amount) : subtotal),
  };
}

export class Checkout {
  private readonly items: number[] = [];
  public constructor(private strategy: PricingStrategy = regularPricing) {}
  public add(price: number): this { this.items.push(price); return this; }
  public use(strategy: PricingStrategy): void { this.strategy = strategy; }
  public total(): number {
    return this.strategy.price(this.items.reduce((sum, p) => sum + p, 0));
  }
}

/* ------------------------------ Command ------------------------------ */

export class TextEditor {
  public text = "";
}

export interface Command {
  execute(): void;
  undo(): void;
}

export class InsertText implements Command {
  public constructor(private readonly editor: TextEditor, private readonly at: number, private readonly inserted: string) {}
  public execute(): void {
    const t = this.editor.text;
    this.editor.text = t.slice(0, this.at) + this.inserted + t.slice(this.at);
  }
  public undo(): void {
    const t = this.editor.text;
    this.editor.text = t.slice(0, this.at) + t.slice(this.at + this.inserted.length);
  }
}

export class DeleteText implements Command {
  private removed = "";
  public constructor(private readonly editor: TextEditor, private readonly at: number, private readonly length: number) {}
  public execute(): void {
    const t = this.editor.text;
    this.removed = t.slice(this.at, this.at + this.length);
    this.editor.text = t.slice(0, this.at) + t.slice(this.at + this.length);
  }
  public undo(): void {
    const t = this.editor.text;
    this.editor.text = t.slice(0, this.at) + this.removed + t.slice(this.at);
  }
}

/**
 * Undo/redo stacks. Running a new command clears the redo stack.
 */
export class CommandHistory {
  private readonly done: Command[] = [];
  private readonly undone: Command[] = [];

  public run(command: Command): void {
    command.execute();
    this.done.push(command);
    this.undone.length = 0;
  }

  /** @returns false when there is nothing to undo */
  public undo(): boolean {
    const command = this.done.pop();
    if (!command) return false;
    command.undo();
    this.undone.push(command);
    return true;
  }

  /** @returns false when there is nothing to redo */
  public redo(): boolean {
    const command = this.undone.pop();
    if (!command) return false;
    command.execute();
    this.done.push(command);
    return true;
  }
}

/* ------------------------------- State ------------------------------- */

export type LightColor = "red" | "green" | "yellow";

interface LightState {
  readonly color: LightColor;
  next(): LightState;
  /** whether cars may enter the junction */
  readonly go: boolean;
}

const RED: LightState = { color: "red", go: false, next: () => GREEN };
const GREEN: LightState = { color: "green", go: true, next: () => YELLOW };
const YELLOW: LightState = { color: "yellow", go: false, next: () => RED };

/** Behavior follows the current state object; `advance` swaps it. */
export class TrafficLight {
  private state: LightState = RED;

  public advance(): LightColor {
    this.state = this.state.next();
    return this.state.color;
  }

  public get color(): LightColor { return this.state.color; }
  public get mayGo(): boolean { return this.state.go; }
}
