import { describe, expect, it } from "vitest";
import { isScreenless, parseCommand, parseStep, PlanStepSchema, targetsOf } from "./intent";

describe("parseStep", () => {
    it.each([
        ["open Safari", { intent: "open_app", description: "open Safari", app: "Safari" }],
        ["Launch Visual Studio Code", { intent: "open_app", description: "Launch Visual Studio Code", app: "Visual Studio Code" }],
        ["quit Notes", { intent: "close_app", description: "quit Notes", app: "Notes" }],
        ["click the OK button", { intent: "click", description: "click the OK button", target: "OK button", button: "left" }],
        ["tap Submit", { intent: "click", description: "tap Submit", target: "Submit", button: "left" }],
        ["double-click on report.pdf", { intent: "click", description: "double-click on report.pdf", target: "report.pdf", button: "double" }],
        ["right click the icon", { intent: "click", description: "right click the icon", target: "icon", button: "right" }],
        ["press Cmd + C", { intent: "key_combo", description: "press Cmd + C", keys: ["cmd", "c"] }],
        ["hit enter", { intent: "key_combo", description: "hit enter", keys: ["enter"] }],
        ["scroll", { intent: "scroll", description: "scroll", direction: "down", amount: 3 }],
        ["scroll up by 5", { intent: "scroll", description: "scroll up by 5", direction: "up", amount: 5 }],
        ["drag the file to the trash", { intent: "drag", description: "drag the file to the trash", target: "file", destination: "trash" }],
        ["what is on screen", { intent: "analyze", description: "what is on screen", question: "what is on screen" }],
    ])("should parse %s", (segment, expected) => {
        const step = parseStep(segment);
        expect(step).toEqual(expected);
        expect(PlanStepSchema.parse(step)).toEqual(expected);
    });

    it("should read quoted text and an optional target for typing", () => {
        expect(parseStep('type "hello world" into the search field')).toEqual({
            intent: "type",
            description: 'type "hello world" into the search field',
            text: "hello world",
            target: "search field",
        });
        expect(parseStep("enter secret in password")).toEqual({
            intent: "type",
            description: "enter secret in password",
            text: "secret",
            target: "password",
        });
        expect(parseStep("type hello")).toEqual({ intent: "type", description: "type hello", text: "hello" });
    });

    it("should trim the segment", () => {
        expect(parseStep("  open Mail  ")).toEqual({ intent: "open_app", description: "open Mail", app: "Mail" });
    });

    it.each(["", "   ", "dance", "start", "scroll down 0"])("should not understand %j", (segment) => {
        expect(parseStep(segment)).toBeUndefined();
    });
});

describe("parseCommand", () => {
    it("should split on then", () => {
        expect(parseCommand("open Notes then type hello")).toEqual([
            { intent: "open_app", description: "open Notes", app: "Notes" },
            { intent: "type", description: "type hello", text: "hello" },
        ]);
    });

    it("should split on semicolons and comma-then", () => {
        expect(parseCommand("open Notes; press cmd+n, then type 'draft'").map((step) => step.intent))
            .toEqual(["open_app", "key_combo", "type"]);
        expect(parseCommand("open Notes and then close Notes").map((step) => step.description))
            .toEqual(["open Notes", "close Notes"]);
    });

    it("should not split words that contain then", () => {
        expect(parseCommand("open authentication settings")).toEqual([
            { intent: "open_app", description: "open authentication settings", app: "authentication settings" },
        ]);
    });

    it("should return an empty plan when any part is not understood", () => {
        expect(parseCommand("open Notes then dance")).toEqual([]);
        expect(parseCommand("   ")).toEqual([]);
    });
});

describe("isScreenless", () => {
    it("should only skip the screen for app and keyboard steps", () => {
        const screenless = parseCommand("open Notes; close Notes; press esc; click OK; scroll; what is shown")
            .map((step) => [step.intent, isScreenless(step)]);
        expect(screenless).toEqual([
            ["open_app", true],
            ["close_app", true],
            ["key_combo", true],
            ["click", false],
            ["scroll", false],
            ["analyze", false],
        ]);
    });
});

describe("targetsOf", () => {
    it("should list the labels a step needs located", () => {
        expect(parseCommand("click OK; drag a to b; type x into Name; type y; scroll").map(targetsOf)).toEqual([
            ["OK"],
            ["a", "b"],
            ["Name"],
            [],
            [],
        ]);
    });
});
