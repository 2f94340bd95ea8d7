// src/patterns/catalog.ts
// Index of the pattern examples in this directory, renderable as markdown.

import { code, renderTable } from "../markdown.js";

export type PatternCategory = "creational" | "structural" | "behavioral";

export const PATTERN_CATEGORIES: readonly PatternCategory[] = ["creational", "structural", "behavioral"];

export interface PatternEntry {
  name: string;
  category: PatternCategory;
  intent: string;
  /** one-line usage of the example in this repo */
  example: string;
}

export const PATTERNS: readonly PatternEntry[] = [
  {
    name: "Singleton",
    category: "creational",
    intent: "Ensure a class has one instance and give a global point of access to it",
    example: "ConfigRegistry.instance().set(\"mode\", \"dev\")",
  },
  {
    name: "Factory Method",
    category: "creational",
    intent: "Let a creation function decide which concrete class to instantiate",
    example: "createShape(\"circle\", 2).area()",
  },
  {
    name: "Builder",
    category: "creational",
    intent: "Assemble a complex object step by step, separately from its representation",
    example: "new SelectBuilder(\"users\").columns(\"id\").limit(5).build()",
  },
  {
    name: "Adapter",
    category: "structural",
    intent: "Convert one interface into the interface a client expects",
    example: "new CelsiusAdapter(fahrenheitSensor).readCelsius()",
  },
  {
    name: "Decorator",
    category: "structural",
    intent: "Attach responsibilities to an object dynamically by wrapping it",
    example: "new WithMilk(new Espresso()).cost()",
  },
  {
    name: "Facade",
    category: "structural",
    intent: "Offer one simple entry point to a set of subsystems",
    example: "new OrderFacade(inventory, payments, shipping).placeOrder(\"mug\", 2, 8)",
  },
  {
    name: "Proxy",
    category: "structural",
    intent: "Stand in for another object to control access to it",
    example: "new CachingLookup(slowLookup).get(\"key\")",
  },
  {
    name: "Observer",
    category: "behavioral",
    intent: "Notify every dependent automatically when a subject changes",
    example: "const off = subject.subscribe(console.log); subject.publish(1); off()",
  },
  {
    name: "Strategy",
    category: "behavioral",
    intent: "Make a family of algorithms interchangeable behind one interface",
    example: "checkout.use(percentOff(10)); checkout.total()",
  },
  {
    name: "Command",
    category: "behavioral",
    intent: "Turn a request into an object so it can be queued, logged and undone",
    example: "history.run(new InsertText(editor, 0, \"hi\")); history.undo()",
  },
  {
    name: "State",
    category: "behavioral",
    intent: "Change an object's behavior by swapping its internal state object",
    example: "new TrafficLight().advance()",
  },
];

function normalize(name: string): string {
  return name.toLowerCase().replace(/[\s-]+/g, "");
}

/** @returns entries of `category` (all entries when omitted), catalog order */
export function listPatterns(category?: PatternCategory): PatternEntry[] {
  return PATTERNS.filter(p => category === undefined || p.category === category);
}

/**
 * @param name ignores case, spaces and hyphens ("factory-method" finds "Factory Method")
 * @returns matching entry, if any
 */
export function findPattern(name: string): PatternEntry | undefined {
  const key = normalize(name);
  return PATTERNS.find(p => normalize(p.name) === key);
}

export function renderCatalog(): string {
  return PATTERN_CATEGORIES.map(category => {
    const title = category.charAt(0).toUpperCase() + category.slice(1);
    const rows = listPatterns(category).map(p => [p.name, p.intent, code(p.example)]);
    return `## ${title}\n\n${renderTable(["Pattern", "Intent", "Example"], rows)}`;
  }).join("\n\n");
}
