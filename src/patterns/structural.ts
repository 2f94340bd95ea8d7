// src/patterns/structural.ts
// Structural examples: Adapter, Decorator, Facade, Proxy.

/* ------------------------------ Adapter ------------------------------ */

/** What our code expects. */
export interface CelsiusSensor {
  readCelsius(): number;
}

/** What the third-party device gives us. */
export interface FahrenheitSensor {
  readFahrenheit(): number;
}

/** Makes a FahrenheitSensor usable wherever a CelsiusSensor is expected. */
export class CelsiusAdapter implements CelsiusSensor {
  public constructor(private readonly source: FahrenheitSensor) {}

  public readCelsius(): number {
    return ((this.source.readFahrenheit() - 32) * 5) / 9;
  }
}

/* ----------------------------- Decorator ----------------------------- */

export interface Beverage {
  cost(): number;
  description(): string;
}

export class Espresso implements Beverage {
  public cost(): number { return 2; }
  public description(): string { return "espresso"; }
}

/** Wraps another beverage and adds to its cost and description. */
abstract class AddOn implements Beverage {
  protected constructor(
    private readonly inner: Beverage,
    private readonly extraCost: number,
    private readonly label: string,
  ) {}
  public cost(): number { return this.inner.cost() + this.extraCost; }
  public description(): string { return `${this.inner.description()} + ${this.label}`; }
}

export class WithMilk extends AddOn {
  public constructor(inner: Beverage) { super(inner, 0.5, "milk"); }
}

export class WithSyrup extends AddOn {
  public constructor(inner: Beverage, flavor: string) { super(inner, 0.75, `${flavor} syrup`); }
}

/* ------------------------------- Facade ------------------------------- */

export type Log = (line: string) => void;

export class Inventory {
  private readonly stock: Map<string, number>;
  public constructor(stock: Record<string, number>, private readonly log: Log) {
    this.stock = new Map(Object.entries(stock));
  }
  public reserve(sku: string, qty: number): boolean {
    const have = this.stock.get(sku) ?? 0;
    if (have < qty) { this.log(`inventory: ${sku} short by ${qty - have}`); return false; }
    this.stock.set(sku, have - qty);
    this.log(`inventory: reserved ${qty} x ${sku}`);
    return true;
  }
  public release(sku: string, qty: number): void {
    this.stock.set(sku, (this.stock.get(sku) ?? 0) + qty);
    this.log(`inventory: released ${qty} x ${sku}`);
  }
  public available(sku: string): number { return this.stock.get(sku) ?? 0; }
}

/** Prepaid account; each successful charge draws the balance down. */
export class Payments {
  public constructor(private balance: number, private readonly log: Log) {}
  public charge(amount: number): boolean {
    if (amount > this.balance) { this.log(`payments: declined ${amount}`); return false; }
    this.balance -= amount;
    this.log(`payments: charged ${amount}`);
    return true;
  }
  public get remaining(): number { return this.balance; }
}

export class Shipping {
  private next = 1;
  public constructor(private readonly log: Log) {}
  public schedule(sku: string, qty: number): string {
    const id = `SHIP-${this.next++}`;
    this.log(`shipping: ${id} for ${qty} x ${sku}`);
    return id;
  }
}

export type OrderResult =
  | { ok: true, shipment: string }
  | { ok: false, reason: "out of stock" | "payment declined" };

/** One call for the whole reserve / charge / ship sequence. */
export class OrderFacade {
  public constructor(
    private readonly inventory: Inventory,
    private readonly payments: Payments,
    private readonly shipping: Shipping,
  ) {}

  /**
   * Reserve stock, charge, then ship; stock is released if the charge fails.
   * @param sku item to order
   * @param qty how many
   * @param unitPrice price per item
   */
  public placeOrder(sku: string, qty: number, unitPrice: number): OrderResult {
    if (!this.inventory.reserve(sku, qty)) return { ok: false, reason: "out of stock" };
    if (!this.payments.charge(qty * unitPrice)) {
      this.inventory.release(sku, qty);
      return { ok: false, reason: "payment declined" };
    }
    return { ok: true, shipment: this.shipping.schedule(sku, qty) };
  }
}

/* ------------------------------- Proxy ------------------------------- */

export interface Lookup<V> {
  get(key: string): Promise<V>;
}

/**
 * Stands in for a slow Lookup and remembers answers. Concurrent requests for
 * the same key share one underlying call; a failed call is not cached.
 */
export class CachingLookup<V> implements Lookup<V> {
  private readonly cache = new Map<string, Promise<V>>();

  public constructor(private readonly subject: Lookup<V>) {}

  public get(key: string): Promise<V> {
    const hit = this.cache.get(key);
    if (hit) return hit;
    const pending = this.subject.get(key);
    this.cache.set(key, pending);
    pending.catch(() => {
      if (this.cache.get(key) === pending) this.cache.delete(key);
    });
    return pending;
  }

  /** @returns number of cached (or in-flight) keys */
  public get size(): number { return this.cache.size; }
}
