import * as fs from "fs";
import * as path from "path";

interface PackageJson {
  main?: string;
  types?: string;
  bin?: Record<string, string>;
}

interface BuildConfig {
  compilerOptions: { rootDir: string; outDir: string };
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(path.resolve(__dirname, "../..", file), "utf-8"));
}

function isPackageJson(value: unknown): value is PackageJson {
  return typeof value === "object" && value !== null;
}

function isBuildConfig(value: unknown): value is BuildConfig {
  if (typeof value !== "object" || value === null || !("compilerOptions" in value)) return false;
  const options = value.compilerOptions;
  return typeof options === "object" && options !== null && "rootDir" in options && "outDir" in options;
}

/** Where `tsc -p <pkg>/tsconfig.build.json` writes the output for a source file. */
function compiledPath(pkg: string, source: string, extension: string): string {
  const config = readJson(`${pkg}/tsconfig.build.json`);
  if (!isBuildConfig(config)) throw new Error(`${pkg}/tsconfig.build.json has no rootDir/outDir`);
  const { rootDir, outDir } = config.compilerOptions;
  return path.posix.join(outDir, path.posix.relative(rootDir, source)).replace(/\.ts$/, extension);
}

describe("package entry points name the compiled output", () => {
  test("the interpreter package", () => {
    const pkg = readJson("interpreter/package.json");
    if (!isPackageJson(pkg)) throw new Error("unreadable package.json");
    expect(pkg.main).toBe(compiledPath("interpreter", "src/index.ts", ".js"));
    expect(pkg.types).toBe(compiledPath("interpreter", "src/index.ts", ".d.ts"));
    expect(fs.existsSync(path.resolve(__dirname, "../../interpreter/src/index.ts"))).toBe(true);
  });

  test("the MCP server package", () => {
    const pkg = readJson("mcp-server/package.json");
    if (!isPackageJson(pkg)) throw new Error("unreadable package.json");
    const entry = compiledPath("mcp-server", "src/index.ts", ".js");
    expect(pkg.main).toBe(entry);
    expect(pkg.bin).toEqual({ "time-warp-mcp": entry });
  });
});
