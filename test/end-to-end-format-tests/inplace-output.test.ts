import fs from "fs";
import { copyFixtureInput, readFixture, runFormatter } from "../utils/runFormatter";

describe("formatting in place", () => {
    let dir: string;

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test("--inplace overwrites the file and prints nothing", () => {
        const fixture = copyFixtureInput("mixed-comments");
        dir = fixture.dir;

        const result = runFormatter([fixture.file, "--inplace"]);

        expect(result.exitCode).toBe(0);
        expect(result.stdout).toBe("");
        expect(result.stderr).toBe("");
        expect(fs.readFileSync(fixture.file, "utf8")).toBe(readFixture("mixed-comments", "expected.c"));
    });

    test("-i rewrites a repeated path only once", () => {
        const fixture = copyFixtureInput("mixed-comments");
        dir = fixture.dir;

        const result = runFormatter(["-i", fixture.file, fixture.file]);

        expect(result.exitCode).toBe(0);
        expect(fs.readFileSync(fixture.file, "utf8")).toBe(readFixture("mixed-comments", "expected.c"));
    });
});

describe("help requested alongside in-place formatting", () => {
    let dir: string;

    beforeEach(() => {
        jest.spyOn(console, "log").mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test("--help leaves the named file untouched", () => {
        const fixture = copyFixtureInput("mixed-comments");
        dir = fixture.dir;

        const result = runFormatter([fixture.file, "--help", "-i"]);

        expect(result.exitCode).toBe(0);
        expect(result.stdout).toBe("");
        expect(fs.readFileSync(fixture.file, "utf8")).toBe(readFixture("mixed-comments", "input.c"));
    });
});
