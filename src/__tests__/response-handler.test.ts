import { describe, expect, test } from "vitest";
import { ResponseInputError } from "../errors.js";
import { ResponseHandler, classifyResponse, hasError } from "../response-handler.js";
import { raw } from "./helpers.js";

describe("classifyResponse", () => {
  describe("GET", () => {
    test("404 Not Found is a successful query for a missing resource", () => {
      expect(classifyResponse("GET", raw(404, "Not Found"))).toEqual({ found: false, success: true });
    });

    test("200 OK means found", () => {
      expect(classifyResponse("GET", raw(200, "OK"))).toEqual({ found: true, success: true });
    });

    test("other status codes fail", () => {
      expect(classifyResponse("GET", raw(500, "Internal Server Error"))).toEqual({ found: false, success: false });
      expect(classifyResponse("GET", raw(401, "Unauthorized"))).toEqual({ found: false, success: false });
    });

    test("200 with a message other than OK fails", () => {
      expect(classifyResponse("GET", raw(200, "Accepted"))).toEqual({ found: false, success: false });
    });

    test("404 with any other message fails", () => {
      expect(classifyResponse("GET", raw(404, "Gone Fishing"))).toEqual({ found: false, success: false });
    });
  });

  describe("POST/PUT/DELETE", () => {
    test("OK without an error changes state", () => {
      for (const verb of ["POST", "PUT", "DELETE"] as const) {
        expect(classifyResponse(verb, raw(200, "OK", {}, verb))).toEqual({ changed: true, success: true });
      }
    });

    test("an embedded error wins over the status code", () => {
      const response = raw(200, "OK", { error: "invalid payload" }, "PUT");
      expect(classifyResponse("PUT", response)).toEqual({ changed: false, success: false });
    });

    test("an error object counts as an error", () => {
      const response = raw(200, "OK", { error: { code: 42 } }, "POST");
      expect(classifyResponse("POST", response)).toEqual({ changed: false, success: false });
    });

    test("an empty error field does not", () => {
      expect(classifyResponse("DELETE", raw(200, "OK", { error: "" }, "DELETE"))).toEqual({
        changed: true,
        success: true,
      });
    });

    test("a message other than OK fails", () => {
      expect(classifyResponse("POST", raw(500, "Internal Server Error", {}, "POST"))).toEqual({
        changed: false,
        success: false,
      });
    });
  });
});

describe("hasError", () => {
  test("treats empty values as no error", () => {
    expect([undefined, null, false, "", [], {}].map(hasError)).toEqual([false, false, false, false, false, false]);
  });

  test("treats non-empty values as errors", () => {
    expect(["x", ["x"], { a: 1 }, 0, true].map(hasError)).toEqual([true, true, true, true, true]);
  });
});

describe("ResponseHandler", () => {
  test("commit() classifies the response for the verb", () => {
    const handler = new ResponseHandler();
    handler.verb = "GET";
    handler.response = raw(404, "Not Found");
    handler.commit();
    expect(handler.result).toEqual({ found: false, success: true });
  });

  test("rejects an unknown verb immediately", () => {
    const handler = new ResponseHandler();
    expect(() => {
      handler.verb = "PATCH";
    }).toThrow(new ResponseInputError("verb must be one of DELETE, GET, POST, PUT. Got PATCH."));
  });

  test("rejects responses without a message or return code", () => {
    const handler = new ResponseHandler();
    expect(() => {
      handler.response = "not a record";
    }).toThrow(ResponseInputError);
    expect(() => {
      handler.response = { returnCode: 200 };
    }).toThrow(new ResponseInputError("response must have a non-empty message"));
    expect(() => {
      handler.response = { message: "OK" };
    }).toThrow(new ResponseInputError("response must have an integer returnCode"));
  });

  test("commit() requires both verb and response", () => {
    const noResponse = new ResponseHandler();
    noResponse.verb = "GET";
    expect(() => noResponse.commit()).toThrow(
      new ResponseInputError("ResponseHandler.response must be set prior to calling commit()"),
    );

    const noVerb = new ResponseHandler();
    noVerb.response = raw(200, "OK");
    expect(() => noVerb.commit()).toThrow(
      new ResponseInputError("ResponseHandler.verb must be set prior to calling commit()"),
    );
  });

  test("result is unavailable until commit()", () => {
    const handler = new ResponseHandler();
    expect(() => handler.result).toThrow(ResponseInputError);
  });

  test("setting a new response clears the previous result", () => {
    const handler = new ResponseHandler();
    handler.verb = "GET";
    handler.response = raw(200, "OK");
    handler.commit();
    handler.response = raw(500, "Internal Server Error");
    expect(() => handler.result).toThrow(ResponseInputError);
  });
});
