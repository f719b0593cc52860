import {
  mkdir,
  mkdtemp,
  readFile,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { type CliDeps, createCli, main, parseItemId } from "./cli.ts";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { storageConfigFor } from "./adapters/config/storage-config.ts";

const NOW = new Date(2024, 4, 1, 8, 0, 0);

let tempDir: string;
let deps: CliDeps;
let stdout: string[];
let stderr: string[];

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "todo-cli-"));
  deps = {
    fs: new NodeFileSystem(),
    config: storageConfigFor(join(tempDir, ".todo")),
    now: () => NOW,
  };
  stdout = [];
  stderr = [];
  vi.spyOn(console, "log").mockImplementation((msg: string) => {
    stdout.push(msg);
  });
  vi.spyOn(console, "error").mockImplementation((msg: string) => {
    stderr.push(msg);
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true });
});

/** Create the list file by hand, as init does not. */
async function seedList(content = "[]"): Promise<void> {
  await mkdir(deps.config.storageDir, { recursive: true });
  await writeFile(deps.config.dataFile, content);
}

// --- Help and version ---

test("todo - shows help when no arguments provided", async () => {
  const write = vi
    .spyOn(process.stdout, "write")
    .mockImplementation(() => true);

  expect(await main([], deps)).toBe(0);

  const output = write.mock.calls.map((call) => String(call[0])).join("");
  expect(output).toContain("Workflow:");
  expect(output).toContain("todo complete <id>");
});

test("todo - help lists subcommands in workflow order", () => {
  const help = createCli(deps).helpInformation();
  const commands = help.slice(help.indexOf("Commands:"));

  const positions = [
    commands.indexOf("init [options]"),
    commands.indexOf("new [options] <todo>"),
    commands.indexOf("complete [options] <id>"),
    commands.indexOf("list [options]"),
  ];
  expect(positions.every((p) => p > 0)).toBe(true);
  expect([...positions].sort((a, b) => a - b)).toEqual(positions);
});

test("todo --version - prints the version", async () => {
  const write = vi
    .spyOn(process.stdout, "write")
    .mockImplementation(() => true);

  expect(await main(["--version"], deps)).toBe(0);
  expect(write).toHaveBeenCalledWith("0.3.0\n");
});

// --- init ---

test("todo init - creates the directory and todo.txt but no todo.json", async () => {
  expect(await main(["init"], deps)).toBe(0);

  expect(stdout).toEqual([
    `path: ${deps.config.storageDir}`,
    "Successfully initialised storage for todo",
  ]);
  expect((await stat(deps.config.storageDir)).isDirectory()).toBe(true);
  expect(await readFile(deps.config.placeholderFile, "utf8")).toBe("");
  await expect(stat(deps.config.dataFile)).rejects.toThrow();
});

test("todo new - still fails after init because todo.json was never created", async () => {
  await main(["init"], deps);

  expect(await main(["new", "Buy milk"], deps)).toBe(1);
  expect(stderr).toEqual([
    "error: not_initialized\nCouldn't load todo list from storage. Run 'todo init' first.",
  ]);
});

test("todo init - second run shows the path before the error", async () => {
  expect(await main(["init"], deps)).toBe(0);
  stdout.length = 0;
  expect(await main(["init"], deps)).toBe(1);

  expect(stdout).toEqual([`path: ${deps.config.storageDir}`]);
  expect(stderr).toEqual([
    `error: already_initialized\nCouldn't create storage file ${deps.config.placeholderFile}: file already exists`,
  ]);
});

test("todo init --json - outputs the result object", async () => {
  expect(await main(["init", "--json"], deps)).toBe(0);

  expect(JSON.parse(stdout[0])).toEqual({
    status: "initialized",
    storageDir: deps.config.storageDir,
    storageFile: deps.config.placeholderFile,
  });
});

// --- new / complete / list ---

test("todo new - appends items and stores them on disk", async () => {
  await seedList();

  expect(await main(["new", "Walk the dog"], deps)).toBe(0);
  expect(await main(["new", "Buy milk"], deps)).toBe(0);

  expect(stdout).toEqual([
    "New item (1) added to todo list.",
    "New item (2) added to todo list.",
  ]);
  const stored = JSON.parse(await readFile(deps.config.dataFile, "utf8"));
  expect(stored).toEqual([
    {
      id: 1,
      text: "Walk the dog",
      done: false,
      created_date: Math.floor(NOW.getTime() / 1000),
      completed_date: null,
    },
    {
      id: 2,
      text: "Buy milk",
      done: false,
      created_date: Math.floor(NOW.getTime() / 1000),
      completed_date: null,
    },
  ]);
});

test("todo new --json - outputs the assigned id", async () => {
  await seedList();

  await main(["new", "Walk the dog", "--json"], deps);

  expect(stdout).toEqual(['{"id":1}']);
});

test("todo complete - marks the item and a second attempt is not found", async () => {
  await seedList();
  await main(["new", "Walk the dog"], deps);
  stdout.length = 0;

  expect(await main(["complete", "1"], deps)).toBe(0);
  expect(stdout).toEqual(["Item 1 (Walk the dog) completed."]);

  expect(await main(["complete", "1"], deps)).toBe(1);
  expect(stderr).toEqual(["error: todo_not_found\nItem 1 not found."]);
});

test("todo complete --json - reports errors as JSON", async () => {
  await seedList();

  expect(await main(["complete", "5", "--json"], deps)).toBe(1);
  expect(stderr).toEqual([
    '{"error":"todo_not_found","code":"todo_not_found","message":"Item 5 not found."}',
  ]);
});

test("todo complete - rejects a non-integer id", async () => {
  await seedList();
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);

  expect(await main(["complete", "abc"], deps)).toBe(1);
  expect(stdout).toEqual([]);
});

test("todo list - hides done items unless --all", async () => {
  await seedList();
  await main(["new", "Walk the dog"], deps);
  await main(["new", "Buy milk"], deps);
  await main(["complete", "1"], deps);
  stdout.length = 0;

  await main(["list"], deps);
  await main(["list", "--all"], deps);

  expect(stdout).toEqual([
    "TODO List\n\n     2. [ ] Buy milk ",
    "TODO List\n\n     1. [X] Walk the dog \n     2. [ ] Buy milk ",
  ]);
});

test("todo list -a -v - shows dates in local time", async () => {
  await seedList();
  await main(["new", "Walk the dog"], deps);
  await main(["complete", "1"], deps);
  stdout.length = 0;

  expect(await main(["list", "-a", "-v"], deps)).toBe(0);

  expect(stdout).toEqual([
    "TODO List\n\n     1. [X] Walk the dog (created: 2024-05-01 08:00:00 completed: 2024-05-01 08:00:00)",
  ]);
});

test("todo list - uninitialized storage is reported", async () => {
  expect(await main(["list"], deps)).toBe(1);
  expect(stderr).toEqual([
    "error: not_initialized\nCouldn't load todo list from storage. Run 'todo init' first.",
  ]);
});

test("todo list - corrupt storage is reported, not thrown", async () => {
  await seedList("not json");

  expect(await main(["list"], deps)).toBe(1);
  expect(stderr).toHaveLength(1);
  expect(stderr[0]).toMatch(
    /^error: corrupt_storage\nTodo list storage is corrupt \(.+todo\.json\): /,
  );
});

// --- argument parsing ---

test("parseItemId - accepts integers and rejects anything else", () => {
  expect(parseItemId("7")).toBe(7);
  expect(() => parseItemId("1.5")).toThrow("Item id must be an integer.");
  expect(() => parseItemId("seven")).toThrow("Item id must be an integer.");
  expect(() => parseItemId("")).toThrow("Item id must be an integer.");
});
