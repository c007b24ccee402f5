import {
  checkSource,
  detectSource,
  handleCheck,
  handleRun,
  readLanguageReference,
  runSource,
  toToolResult,
} from "../src/tools";

describe("checkSource", () => {
  test("valid programs have no errors", () => {
    expect(checkSource({ source: '10 PRINT "HI"' })).toEqual({ language: "basic", valid: true, errors: [] });
  });

  test("syntax errors carry their position", () => {
    const report = checkSource({ source: "PRINT 1\nPRINT 1 +", language: "basic" });
    expect(report.valid).toBe(false);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0].line).toBe(2);
    expect(report.errors[0].message).toBe("expected an expression, found end of line");
  });

  test("the language is detected when omitted", () => {
    expect(checkSource({ source: "program p;\nbegin\nend." }).language).toBe("pascal");
  });
});

describe("runSource", () => {
  test("collects output", () => {
    const report = runSource({ source: "FOR I = 1 TO 3: PRINT I: NEXT" });
    expect(report.success).toBe(true);
    expect(report.output).toEqual(["1", "2", "3"]);
    expect(report.final).toEqual({ kind: "completed", reason: "finished" });
  });

  test("counts drawing primitives", () => {
    const report = runSource({ source: "FORWARD 10\nRIGHT 90\nFORWARD 10" });
    expect(report.drawCount).toBe(2);
    expect(report.output).toEqual([]);
  });

  test("answers input requests in order", () => {
    const report = runSource({ source: "INPUT A\nINPUT B\nPRINT A * B", inputs: ["6", "7"] });
    expect(report.output).toEqual(["42"]);
  });

  test("reports a run left waiting for input", () => {
    const report = runSource({ source: "INPUT A\nPRINT A" });
    expect(report.success).toBe(false);
    expect(report.awaitingInput).toBe(true);
  });

  test("maxSteps bounds endless programs", () => {
    const report = runSource({ source: "10 GOTO 10", maxSteps: 100 });
    expect(report.success).toBe(false);
    expect(report.final).toEqual({ kind: "runtime-error", category: "step-limit", message: "step limit of 100 exceeded" });
  });

  test("syntax errors stop before running", () => {
    const report = runSource({ source: "begin end", language: "pascal" });
    expect(report.success).toBe(false);
    expect(report.errors?.[0].message).toBe("expected '.' after the main block, found end of input");
  });

  test("Prolog goals", () => {
    const report = runSource({ source: "p(1).\np(2).\n?- p(X), write(X), nl." });
    expect(report.language).toBe("prolog");
    expect(report.output).toEqual(["1", "2"]);
    expect(report.final).toEqual({ kind: "completed", reason: "no-more-solutions" });
  });
});

test("detectSource prefers the file extension", () => {
  expect(detectSource({ source: "10 PRINT 1", fileName: "x.pro" })).toEqual({ language: "prolog" });
  expect(detectSource({ source: "10 PRINT 1" })).toEqual({ language: "basic" });
});

describe("tool results", () => {
  test("toToolResult wraps JSON text", () => {
    expect(toToolResult({ a: 1 })).toEqual({ content: [{ type: "text", text: '{\n  "a": 1\n}' }] });
    expect(toToolResult({}, true).isError).toBe(true);
  });

  test("a failed check is not a tool error", () => {
    const result = handleCheck({ source: "PRINT 1 +", language: "basic" });
    expect(result.isError).toBeUndefined();
    expect(JSON.parse(result.content[0].text)).toMatchObject({ valid: false });
  });

  test("a run that cannot load is a tool error", () => {
    expect(handleRun({ source: "PRINT 1 +", language: "basic" }).isError).toBe(true);
    expect(handleRun({ source: "PRINT 1", language: "basic" }).isError).toBeUndefined();
  });

  test("a run that ends in a runtime error is a tool error", () => {
    const result = handleRun({ source: "10 GOTO 99", language: "basic" });
    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content[0].text)).toMatchObject({
      success: false,
      final: { kind: "runtime-error", category: "undefined-line" },
    });
  });
});

test("the language reference ships beside the server", () => {
  expect(readLanguageReference().startsWith("# Time Warp languages")).toBe(true);
});
