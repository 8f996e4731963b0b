import { DetectionError, describeError, errorCode } from "../errors/Errors.js";

describe("error helpers", () => {
    it("reads the code of an error-like value from any realm", () => {
        const foreign = { message: "spawn missing ENOENT", code: "ENOENT" };
        expect(errorCode(foreign)).toBe("ENOENT");
        expect(describeError(foreign)).toBe("spawn missing ENOENT");
    });

    it("has no code for values without one", () => {
        expect(errorCode(new Error("plain"))).toBeUndefined();
        expect(errorCode({ code: 2 })).toBeUndefined();
        expect(errorCode("ENOENT")).toBeUndefined();
    });

    it("describes errors by message and other values as text", () => {
        expect(describeError(new DetectionError("nothing here", "/tmp/project"))).toBe("nothing here");
        expect(describeError(42)).toBe("42");
    });
});
