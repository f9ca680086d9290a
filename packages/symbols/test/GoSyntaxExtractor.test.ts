import { describe, it, expect, beforeAll } from "vitest";
import { LANGUAGES, ParseFailure } from "../src/core/model.js";
import type { CodeSymbol } from "../src/core/model.js";
import { GoSyntaxExtractor } from "../src/infrastructure/extractors/GoSyntaxExtractor.js";

const SOURCE = `package users

import "fmt"

// User is a person.
type User struct {
	ID   int    \`json:"id"\`
	Name string
}

type Store interface {
	Get(id int) (*User, error)
}

const MaxUsers = 100

var defaultName string = "anon"

func NewUser(name string, age int) *User {
	return &User{Name: name}
}

func (u *User) Rename(first, last string) (string, error) {
	return fmt.Sprintf("%s %s", first, last), nil
}

func Sum(values ...int) int {
	return 0
}
`;

describe("GoSyntaxExtractor", () => {
  let extractor: GoSyntaxExtractor;

  beforeAll(() => {
    extractor = new GoSyntaxExtractor();
  });

  async function extract(source: string, filePath = "users/user.go"): Promise<CodeSymbol[]> {
    const result = await extractor.extract(source, filePath, LANGUAGES.go);
    if (!result.ok) throw result.error;
    return result.value;
  }

  describe("declarations", () => {
    let symbols: CodeSymbol[];

    beforeAll(async () => {
      symbols = await extract(SOURCE);
    });

    const byName = (name: string) => symbols.find((s) => s.name === name);

    it("extracts only top-level declarations", () => {
      expect(symbols.map((s) => s.name)).toEqual([
        "User",
        "Store",
        "MaxUsers",
        "defaultName",
        "NewUser",
        "Rename",
        "Sum",
      ]);
    });

    it("extracts struct types with a canonical signature", () => {
      const user = byName("User");
      expect(user?.kind).toBe("struct");
      expect(user?.startLine).toBe(6);
      expect(user?.endLine).toBe(9);
      expect(user?.exported).toBe(true);
      expect(user?.signature).toBe('type User struct{ID int `json:"id"`; Name string}');
    });

    it("extracts interfaces with their method sets", () => {
      const store = byName("Store");
      expect(store?.kind).toBe("interface");
      expect(store?.signature).toBe("type Store interface{Get(id int) (*User, error)}");
    });

    it("extracts constants and variables", () => {
      const max = byName("MaxUsers");
      expect(max?.kind).toBe("constant");
      expect(max?.startLine).toBe(15);
      expect(max?.signature).toBe("const MaxUsers");
      expect(max?.exported).toBe(true);

      const name = byName("defaultName");
      expect(name?.kind).toBe("variable");
      expect(name?.signature).toBe("var defaultName string");
      expect(name?.exported).toBe(false);
    });

    it("extracts functions", () => {
      const newUser = byName("NewUser");
      expect(newUser).toMatchObject({
        kind: "function",
        startLine: 19,
        endLine: 21,
        exported: true,
        parameters: ["name string", "age int"],
        returnType: "*User",
        parent: "",
        filePath: "users/user.go",
        signature: "func NewUser(name string, age int) *User",
      });
    });

    it("extracts methods with the receiver type as parent", () => {
      const rename = byName("Rename");
      expect(rename).toMatchObject({
        kind: "method",
        parent: "User",
        parameters: ["first string", "last string"],
        returnType: "string, error",
        signature: "func (u *User) Rename(first string, last string) (string, error)",
      });
    });

    it("renders variadic parameters", () => {
      expect(byName("Sum")?.parameters).toEqual(["values ...int"]);
    });
  });

  it("produces the same signature regardless of formatting and comments", async () => {
    const compact = await extract("package p\n\nfunc Add(a int, b int) (int, error) {\n\treturn a + b, nil\n}\n");
    const spread = await extract(
      "package p\n\n// Add adds.\nfunc Add(a int,\n\tb int,\n) (int, /* sum */ error) {\n\treturn a + b, nil\n}\n"
    );

    expect(compact[0].signature).toBe("func Add(a int, b int) (int, error)");
    expect(spread[0].signature).toBe(compact[0].signature);
    expect(spread[0].parameters).toEqual(compact[0].parameters);
  });

  it("handles generic functions and receivers", async () => {
    const symbols = await extract(
      "package p\n\nfunc Map[T any](xs []T) []T {\n\treturn xs\n}\n\nfunc (s *Stack[T]) Push(v T) {\n}\n"
    );

    expect(symbols[0].signature).toBe("func Map[T any](xs []T) []T");
    expect(symbols[1].parent).toBe("Stack");
    expect(symbols[1].signature).toBe("func (s *Stack[T]) Push(v T)");
  });

  it("treats lowercase and underscore names as unexported", async () => {
    const symbols = await extract("package p\n\nfunc helper() {}\n\nfunc _skip() {}\n\nfunc Ünicode() {}\n");
    expect(symbols.map((s) => s.exported)).toEqual([false, false, true]);
  });

  it("returns an empty list for a file with only a package clause", async () => {
    expect(await extract("package p\n")).toEqual([]);
  });

  it("parses sources larger than the default parser buffer", async () => {
    const handlers = Array.from({ length: 1500 }, (_, i) => `func Handler${i}(value int) int {\n\treturn value + ${i}\n}\n`);
    const source = ["package big", "", ...handlers].join("\n");
    expect(source.length).toBeGreaterThan(64 * 1024);

    const symbols = await extract(source, "big.go");

    expect(symbols).toHaveLength(1500);
    expect(symbols[1499]).toMatchObject({
      name: "Handler1499",
      startLine: 5999,
      endLine: 6001,
      signature: "func Handler1499(value int) int",
    });
  });

  it("rejects invalid source as a whole", async () => {
    const result = await extractor.extract("package p\n\nfunc Broken( {\n", "broken.go", LANGUAGES.go);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseFailure);
    expect(result.error.message).toMatch(/^broken\.go: \d+ syntax error\(s\)/);
  });
});
