// test/targeted-feature-tests/env-override-of-log-level.test.ts

import { Logger } from "../../src/runner/Logger";

describe("LOGLEVEL takes precedence over the level a run configures", () => {
    let warnSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
        errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
        delete process.env.LOGLEVEL;
    });

    test("LOGLEVEL overrides configured log level", () => {
        process.env.LOGLEVEL = "debug";

        Logger.setLevel("silent");
        Logger.debug("env wins");

        expect(errorSpy).toHaveBeenCalledWith("[line-comment-normalizer][debug] env wins");
    });

    test("LOGLEVEL override emits warning (unless silent)", () => {
        process.env.LOGLEVEL = "info";

        Logger.setLevel("debug");

        expect(warnSpy).toHaveBeenCalledWith(
            "[line-comment-normalizer][warn] Log level overridden via environment variable LOGLEVEL=info"
        );
        expect(Logger.getLevel()).toBe("info");
    });

    test("LOGLEVEL=silent suppresses override warning", () => {
        process.env.LOGLEVEL = "silent";

        Logger.setLevel("debug");

        expect(warnSpy).not.toHaveBeenCalled();
        expect(Logger.getLevel()).toBe("silent");
    });

    test("empty LOGLEVEL is ignored", () => {
        process.env.LOGLEVEL = "";

        Logger.setLevel("info");

        expect(warnSpy).not.toHaveBeenCalled();
        expect(Logger.getLevel()).toBe("info");
    });

    test("LOGLEVEL=silent hides the progress of a verbose run", () => {
        process.env.LOGLEVEL = "silent";

        Logger.setLevel("info");
        Logger.info("Formatting 'main.c'");

        expect(errorSpy).not.toHaveBeenCalled();
    });

    test("invalid LOGLEVEL throws immediately", () => {
        process.env.LOGLEVEL = "loud";

        expect(() => {
            Logger.setLevel("info");
        }).toThrow(/Invalid LOGLEVEL value/i);
    });
});
