// src/patterns/creational.ts
// Creational examples: Singleton, Factory Method, Builder.

/* ----------------------------- Singleton ----------------------------- */

/**
 * Process-wide settings store. There is exactly one instance, reached
 * through ConfigRegistry.instance(); the constructor is private.
 */
export class ConfigRegistry {
  private static shared: ConfigRegistry | undefined;
  private readonly values = new Map<string, string>();

  private constructor() {}

  /** @returns the one registry, created on first use */
  public static instance(): ConfigRegistry {
    if (ConfigRegistry.shared === undefined) ConfigRegistry.shared = new ConfigRegistry();
    return ConfigRegistry.shared;
  }

  public set(key: string, value: string): void { this.values.set(key, value); }

  /** @returns the value for `key`, or `fallback` when unset */
  public get(key: string, fallback?: string): string | undefined {
    return this.values.get(key) ?? fallback;
  }

  public clear(): void { this.values.clear(); }
}

/* --------------------------- Factory Method --------------------------- */

export interface Shape {
  readonly kind: ShapeKind;
  area(): number;
  describe(): string;
}

export type ShapeKind = "circle" | "square" | "triangle";

class Circle implements Shape {
  public readonly kind = "circle";
  public constructor(private readonly radius: number) {}
  public area(): number { return Math.PI * this.radius ** 2; }
  public describe(): string { return `circle r=${this.radius}`; }
}

class Square implements Shape {
  public readonly kind = "square";
  public constructor(private readonly side: number) {}
  public area(): number { return this.side ** 2; }
  public describe(): string { return `square side=${this.side}`; }
}

/** Equilateral. */
class Triangle implements Shape {
  public readonly kind = "triangle";
  public constructor(private readonly side: number) {}
  public area(): number { return (Math.sqrt(3) / 4) * this.side ** 2; }
  public describe(): string { return `triangle side=${this.side}`; }
}

/**
 * Callers name the kind; the factory picks the class.
 * @param kind which shape
 * @param size radius for circles, side length otherwise; must be positive
 */
export function createShape(kind: ShapeKind, size: number): Shape {
  if (!Number.isFinite(size) || size <= 0) throw new Error(`Shape size must be positive, got ${size}`);
  switch (kind) {
    case "circle": return new Circle(size);
    case "square": return new Square(size);
    case "triangle": return new Triangle(size);
  }
}

/* ------------------------------ Builder ------------------------------ */

export type SortDirection = "ASC" | "DESC";

/**
 * Step-by-step construction of a SELECT statement.
 *
 * new SelectBuilder("users").columns("id", "name").where("age > 18").orderBy("name").limit(10).build()
 *   => "SELECT id, name FROM users WHERE age > 18 ORDER BY name LIMIT 10"
 */
export class SelectBuilder {
  private readonly selected: string[] = [];
  private readonly conditions: string[] = [];
  private readonly ordering: string[] = [];
  private rowLimit: number | undefined;

  public constructor(private readonly table: string) {
    if (table.trim().length === 0) throw new Error("SelectBuilder needs a table name");
  }

  public columns(...names: string[]): this {
    this.selected.push(...names);
    return this;
  }

  /** Conditions added by repeated calls are joined with AND. */
  public where(condition: string): this {
    this.conditions.push(condition);
    return this;
  }

  public orderBy(column: string, direction?: SortDirection): this {
    this.ordering.push(direction ? `${column} ${direction}` : column);
    return this;
  }

  public limit(n: number): this {
    if (!Number.isInteger(n) || n < 0) throw new Error(`LIMIT must be a nonnegative integer, got ${n}`);
    this.rowLimit = n;
    return this;
  }

  /** @returns the statement text, without a trailing semicolon */
  public build(): string {
    const parts = [`SELECT ${this.selected.length > 0 ? this.selected.join(", ") : "*"}`, `FROM ${this.table}`];
    if (this.conditions.length > 0) parts.push(`WHERE ${this.conditions.join(" AND ")}`);
    if (this.ordering.length > 0) parts.push(`ORDER BY ${this.ordering.join(", ")}`);
    if (this.rowLimit !== undefined) parts.push(`LIMIT ${this.rowLimit}`);
    return parts.join(" ");
  }
}
