import { describe, it, expect } from "vitest";
import { LANGUAGES } from "../src/core/model.js";
import type { CodeSymbol, Language } from "../src/core/model.js";
import type { LanguageExtractor } from "../src/core/ports/LanguageExtractor.js";
import { JavaPatternExtractor } from "../src/infrastructure/extractors/JavaPatternExtractor.js";
import { PythonPatternExtractor, isPythonPublic } from "../src/infrastructure/extractors/PythonPatternExtractor.js";
import { RustPatternExtractor } from "../src/infrastructure/extractors/RustPatternExtractor.js";
import { TypeScriptPatternExtractor } from "../src/infrastructure/extractors/TypeScriptPatternExtractor.js";

async function extract(
  extractor: LanguageExtractor,
  source: string,
  filePath: string,
  language: Language
): Promise<CodeSymbol[]> {
  const result = await extractor.extract(source, filePath, language);
  if (!result.ok) throw result.error;
  return result.value;
}

describe("TypeScriptPatternExtractor", () => {
  const source = [
    'import { x } from "./x";',
    "",
    "export interface Options {",
    "  verbose: boolean;",
    "}",
    "",
    "export class UserService {",
    "  private cache = new Map();",
    "",
    "  constructor(private readonly db: Db) {}",
    "",
    "  async getUser(id: string): Promise<User> {",
    "    return this.db.find(id);",
    "  }",
    "",
    "  private reset(): void {",
    "    this.cache.clear();",
    "  }",
    "}",
    "",
    "export function createUser(name: string, age?: number): User {",
    "  return { name, age };",
    "}",
    "",
    "export const formatName = (first: string, last: string): string => `${first} ${last}`;",
    "",
    "const LIMIT = 10;",
    "",
    "type Internal = { id: string };",
    "",
    "export { LIMIT };",
  ].join("\n");

  const load = () => extract(new TypeScriptPatternExtractor(), source, "src/users.ts", LANGUAGES.typescript);

  it("extracts classes and interfaces with their block extents", async () => {
    const symbols = await load();
    expect(symbols.find((s) => s.name === "UserService")).toMatchObject({
      kind: "class",
      startLine: 7,
      endLine: 19,
      exported: true,
    });
    expect(symbols.find((s) => s.name === "Options")).toMatchObject({
      kind: "interface",
      startLine: 3,
      endLine: 5,
      exported: true,
    });
  });

  it("extracts functions with parameters and return type", async () => {
    const symbols = await load();
    expect(symbols.find((s) => s.name === "createUser")).toMatchObject({
      kind: "function",
      startLine: 21,
      endLine: 23,
      parameters: ["name: string", "age?: number"],
      returnType: "User",
      signature: "function createUser(name: string, age?: number): User",
    });
  });

  it("extracts arrow functions once, as functions", async () => {
    const symbols = await load();
    const arrows = symbols.filter((s) => s.name === "formatName");
    expect(arrows).toHaveLength(1);
    expect(arrows[0]).toMatchObject({
      kind: "function",
      exported: true,
      parameters: ["first: string", "last: string"],
      returnType: "string",
      signature: "const formatName = (first: string, last: string): string =>",
    });
  });

  it("extracts class methods and skips constructors", async () => {
    const symbols = await load();
    const methods = symbols.filter((s) => s.kind === "method");
    expect(methods.map((m) => m.name)).toEqual(["getUser", "reset"]);
    expect(methods[0]).toMatchObject({
      parent: "UserService",
      startLine: 12,
      endLine: 14,
      exported: true,
      returnType: "Promise<User>",
      signature: "getUser(id: string): Promise<User>",
    });
    expect(methods[1].exported).toBe(false);
  });

  it("honors export lists", async () => {
    const symbols = await load();
    expect(symbols.find((s) => s.name === "LIMIT")).toMatchObject({ kind: "constant", exported: true });
    expect(symbols.find((s) => s.name === "Internal")).toMatchObject({ kind: "type", exported: false });
  });
});

describe("PythonPatternExtractor", () => {
  const source = [
    "MAX_RETRIES = 3",
    "",
    "class Client:",
    "    def __init__(self, url):",
    "        self.url = url",
    "",
    "    def fetch(self, path: str) -> dict:",
    "        return {}",
    "",
    "    def _retry(self):",
    "        pass",
    "",
    "def connect(url: str, timeout: int = 5) -> Client:",
    "    return Client(url)",
    "",
    "def _helper():",
    "    pass",
  ].join("\n");

  const load = () => extract(new PythonPatternExtractor(), source, "client.py", LANGUAGES.python);

  it("uses indentation for class extents", async () => {
    const symbols = await load();
    expect(symbols.find((s) => s.name === "Client")).toMatchObject({ kind: "class", startLine: 3, endLine: 11 });
  });

  it("extracts top-level functions", async () => {
    const symbols = await load();
    expect(symbols.find((s) => s.name === "connect")).toMatchObject({
      kind: "function",
      startLine: 13,
      endLine: 14,
      exported: true,
      parameters: ["url: str", "timeout: int = 5"],
      returnType: "Client",
      signature: "def connect(url: str, timeout: int = 5) -> Client",
    });
    expect(symbols.find((s) => s.name === "_helper")?.exported).toBe(false);
  });

  it("extracts methods without the receiver parameter", async () => {
    const symbols = await load();
    const methods = symbols.filter((s) => s.kind === "method");
    expect(methods.map((m) => [m.name, m.exported])).toEqual([
      ["__init__", false],
      ["fetch", true],
      ["_retry", false],
    ]);
    expect(methods[1]).toMatchObject({
      parent: "Client",
      parameters: ["path: str"],
      signature: "def fetch(path: str) -> dict",
    });
  });

  it("extracts upper-case module constants", async () => {
    const symbols = await load();
    expect(symbols.find((s) => s.name === "MAX_RETRIES")).toMatchObject({ kind: "constant", startLine: 1 });
  });

  it("applies the underscore convention", () => {
    expect(isPythonPublic("run")).toBe(true);
    expect(isPythonPublic("_run")).toBe(false);
    expect(isPythonPublic("__run")).toBe(false);
    expect(isPythonPublic("__eq__")).toBe(false);
  });
});

describe("RustPatternExtractor", () => {
  const source = [
    "pub struct Config {",
    "    pub name: String,",
    "}",
    "",
    "pub trait Render {",
    "    fn render(&self) -> String;",
    "}",
    "",
    "impl Config {",
    "    pub fn new(name: &str) -> Self {",
    "        Config { name: name.to_string() }",
    "    }",
    "",
    "    fn validate(&self) -> bool {",
    "        true",
    "    }",
    "}",
    "",
    "impl Render for Config {",
    "    fn render(&self) -> String {",
    "        self.name.clone()",
    "    }",
    "}",
    "",
    "pub fn load(path: &str) -> Result<Config, Error> {",
    "    todo!()",
    "}",
    "",
    "fn helper() {}",
    "",
    'pub const VERSION: &str = "1.0";',
  ].join("\n");

  const load = () => extract(new RustPatternExtractor(), source, "src/config.rs", LANGUAGES.rust);

  it("extracts structs, traits and constants", async () => {
    const symbols = await load();
    expect(symbols.find((s) => s.name === "Config")).toMatchObject({ kind: "struct", startLine: 1, endLine: 3, exported: true });
    expect(symbols.find((s) => s.name === "Render")).toMatchObject({ kind: "interface", endLine: 7 });
    expect(symbols.find((s) => s.name === "VERSION")).toMatchObject({ kind: "constant", startLine: 31, exported: true });
  });

  it("extracts free functions", async () => {
    const symbols = await load();
    expect(symbols.find((s) => s.name === "load")).toMatchObject({
      kind: "function",
      exported: true,
      parameters: ["path: &str"],
      returnType: "Result<Config, Error>",
      signature: "fn load(path: &str) -> Result<Config, Error>",
    });
    expect(symbols.find((s) => s.name === "helper")).toMatchObject({ exported: false, startLine: 29, endLine: 29 });
  });

  it("attributes methods to impl and trait owners", async () => {
    const symbols = await load();
    const methods = symbols.filter((s) => s.kind === "method");
    expect(methods.map((m) => [m.name, m.parent, m.exported])).toEqual([
      ["render", "Render", true],
      ["new", "Config", true],
      ["validate", "Config", false],
      ["render", "Config", true],
    ]);
    expect(methods[1]).toMatchObject({ parameters: ["name: &str"], returnType: "Self" });
    expect(methods[0].parameters).toEqual([]);
  });
});

describe("JavaPatternExtractor", () => {
  const source = [
    "package app;",
    "",
    "public class OrderService {",
    "    private final Repo repo;",
    "",
    "    public OrderService(Repo repo) {",
    "        this.repo = repo;",
    "    }",
    "",
    "    public Order find(String id) {",
    "        return repo.get(id);",
    "    }",
    "",
    "    public Order find(String id, boolean deep) {",
    "        return repo.get(id);",
    "    }",
    "",
    "    private void audit(Order order) {",
    "    }",
    "",
    "    protected static List<Order> all() {",
    "        return null;",
    "    }",
    "}",
    "",
    "interface Repo {",
    "    Order get(String id);",
    "}",
  ].join("\n");

  const load = () => extract(new JavaPatternExtractor(), source, "app/OrderService.java", LANGUAGES.java);

  it("extracts types with visibility from modifiers", async () => {
    const symbols = await load();
    expect(symbols.find((s) => s.name === "OrderService")).toMatchObject({ kind: "class", endLine: 24, exported: true });
    expect(symbols.find((s) => s.name === "Repo")).toMatchObject({ kind: "interface", startLine: 26, exported: false });
  });

  it("extracts overloaded methods and skips constructors", async () => {
    const symbols = await load();
    const methods = symbols.filter((s) => s.kind === "method");
    expect(methods.map((m) => m.name)).toEqual(["find", "find", "audit", "all"]);
    expect(methods[1]).toMatchObject({
      parent: "OrderService",
      startLine: 14,
      parameters: ["String id", "boolean deep"],
      returnType: "Order",
      signature: "Order find(String id, boolean deep)",
      exported: true,
    });
    expect(methods[2]).toMatchObject({ exported: false, returnType: "void", endLine: 19 });
    expect(methods[3]).toMatchObject({ exported: false, returnType: "List<Order>" });
  });
});
