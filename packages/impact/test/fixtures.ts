import type { CodeSymbol } from "@api-drift/symbols";

export const USER_GO = `package app

type User struct {
	ID   int
	Name string
}

func NewUser(name string) *User {
	return &User{Name: name}
}

func (u *User) Greeting() string {
	return "hello " + u.Name
}
`;

export const HANDLER_GO = `package app

// HandleCreate builds a User from the request.
func HandleCreate(name string) *User {
	user := NewUser(name)
	return user
}

func HandleGreet(u *User) string {
	return u.Greeting()
}
`;

/**
 * A Go file with `calls` lines that each reference Process.
 */
export function callersOf(calls: number): string {
  return ["package lib", "", "func run() {", ...Array<string>(calls).fill("\tProcess(1)"), "}", ""].join("\n");
}

export function symbol(fields: Partial<CodeSymbol> & Pick<CodeSymbol, "name">): CodeSymbol {
  return {
    kind: "function",
    startLine: 1,
    endLine: 1,
    signature: "",
    exported: true,
    parameters: [],
    returnType: "",
    parent: "",
    filePath: "app.go",
    ...fields,
  };
}
