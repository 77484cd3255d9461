import { describe, expect, test } from "vitest";
import { createLinterWithDefaultRules } from "../src/rules";
import { isTypeLike } from "../src/rules/pointer-spacing";

const linter = createLinterWithDefaultRules(["pointer-spacing"]);

function fixed(text: string): string {
  return linter.fix(text).code;
}

function count(text: string): number {
  return linter.scan(text).count;
}

describe("PointerSpacingRule", () => {
  describe("canonical spacing", () => {
    test.each([
      ["int* ptr;", "int *ptr;"],
      ["int*ptr;", "int *ptr;"],
      ["char * str;", "char *str;"],
      ["int * * pp;", "int **pp;"],
      ["int main(int argc, char** argv);", "int main(int argc, char **argv);"],
      ["unsigned long* total;", "unsigned long *total;"],
      ["size_t* len;", "size_t *len;"],
      ["const char* name = 0;", "const char *name = 0;"],
    ])("%s -> %s", (input, expected) => {
      expect(fixed(input)).toBe(expected);
    });

    test("leaves canonical declarations alone", () => {
      expect(count("int *ptr;\nchar **argv;\nint (*fp)(void);\n")).toBe(0);
    });

    test("keeps column alignment before the star", () => {
      expect(count("int    *a;\nchar   *b;\n")).toBe(0);
    });
  });

  describe("declaration context", () => {
    test("typedef names at statement start", () => {
      expect(fixed("Node* head = NULL;")).toBe("Node *head = NULL;");
      expect(fixed("static Node* head;")).toBe("static Node *head;");
    });

    test("struct tags", () => {
      expect(fixed("struct node* next;")).toBe("struct node *next;");
    });

    test("asymmetric typedef parameter", () => {
      expect(fixed("void f(Node* n);")).toBe("void f(Node *n);");
      expect(fixed("Node *make(Node* a, Node* b);")).toBe("Node *make(Node *a, Node *b);");
      expect(fixed("static int\ncount(Node* head)\n{\n}\n")).toBe(
        "static int\ncount(Node *head)\n{\n}\n"
      );
    });

    test("function pointer parameter list", () => {
      expect(fixed("void (*visit)(Node* n);")).toBe("void (*visit)(Node *n);");
    });

    test("declarations after case and default labels", () => {
      const input = "switch (k)\n{\ncase 2: Node* m;\ndefault: Node* n = 0;\n}\n";
      expect(fixed(input)).toBe(
        "switch (k)\n{\ncase 2: Node *m;\ndefault: Node *n = 0;\n}\n"
      );
    });

    test("qualifier after the star is treated as the declarator", () => {
      expect(fixed("int* const p;")).toBe("int *const p;");
      expect(fixed("char* const* p;")).toBe("char *const *p;");
    });

    test("function pointers", () => {
      expect(fixed("int (* fp)(void);")).toBe("int (*fp)(void);");
      expect(fixed("void (* * table)[4];")).toBe("void (**table)[4];");
    });

    test("each declarator of a list is checked", () => {
      expect(fixed("int* a, * b;")).toBe("int *a, *b;");
      expect(linter.scan("int* a, * b;").count).toBe(2);
    });

    test("declarator lists with a typedef name", () => {
      expect(linter.scan("Node * a, * b;").count).toBe(2);
      expect(fixed("Node * a, * b;")).toBe("Node *a, *b;");
      expect(fixed("Node a, * b;")).toBe("Node a, *b;");
    });
  });

  describe("multiplication is not a declaration", () => {
    test.each([
      "int c = a * b;",
      "x = a * b;",
      "return a * b;",
      "total = price*quantity;",
      'printf("%d", a * b);',
      "y = x * *p;",
      "n = sizeof * p;",
      "buf = malloc(n * sizeof(int));",
      "foo(a, * b);",
      "x = (a* b);",
      'printf("%d", a* b);',
      "if (w* h) {}",
      "while (i* j < n) {}",
      "return (n* m);",
      "area = f(w* h, 2);",
      "x = y * f(a* b);",
      "y = g(h(a* b));",
      "d = (double)(w* h);",
      "y = c ? b : a* d;",
    ])("%s", (input) => {
      expect(count(input)).toBe(0);
    });
  });

  describe("literals, comments and directives", () => {
    test.each([
      'char *s = "int* x {";',
      "// int* x {",
      "/* char * s; */",
      "c = '*';",
      "#define MUL(a, b) a* b\n",
      "#define DECL \\\n  int* x\n",
    ])("%s", (input) => {
      expect(count(input)).toBe(0);
    });

    test("a comment between type and star is never deleted", () => {
      expect(fixed("int/* c */* p;")).toBe("int/* c */* p;");
    });

    test("an unclosed quote ends at the end of its line", () => {
      expect(fixed("#error don't\nint* p;\n")).toBe("#error don't\nint *p;\n");
      expect(fixed('s = "abc\nint* p;\n')).toBe('s = "abc\nint *p;\n');
    });

    test("a CRLF line splice keeps the comment going", () => {
      expect(count("// note \\\r\nint* p;\r\n")).toBe(0);
    });

    test("casts are not touched", () => {
      expect(count("p = (char*)malloc(10);")).toBe(0);
    });
  });

  test("reports position and replacement", () => {
    const [violation] = linter.scan("int x;\nchar* s;").violations;

    expect(violation).toMatchObject({
      rule: "pointer-spacing",
      line: 2,
      column: 5,
      originalText: "* ",
      suggestedText: " *",
    });
  });

  test("isTypeLike", () => {
    expect(isTypeLike("int")).toBe(true);
    expect(isTypeLike("uint8_t")).toBe(true);
    expect(isTypeLike("count")).toBe(false);
  });
});
