import { NotImplementedException } from "@nestjs/common";
import { DispatchMode, InstrumentedRequest, InstrumentedResponse } from "@logging/domain";
import { MiddlewareDispatcher, markCooperative } from "./middleware-dispatcher";

const request: InstrumentedRequest = {
  method: "GET",
  path: "/reports",
  query: {},
  headers: {},
  meta: {},
};

const response: InstrumentedResponse = { statusCode: 200, getHeader: () => undefined };

class BareDispatcher extends MiddlewareDispatcher {}

class RecordingDispatcher extends MiddlewareDispatcher {
  readonly paths: string[] = [];

  protected handleBlocking(): InstrumentedResponse {
    this.paths.push("blocking");
    return response;
  }

  protected async handleCooperative(): Promise<InstrumentedResponse> {
    this.paths.push("cooperative");
    return response;
  }
}

describe("MiddlewareDispatcher", () => {
  describe("mode detection", () => {
    it("should treat an async handler as cooperative", () => {
      const dispatcher = new BareDispatcher(async () => response);

      expect(dispatcher.mode).toBe(DispatchMode.COOPERATIVE);
    });

    it("should treat a plain handler as blocking", () => {
      const dispatcher = new BareDispatcher(() => response);

      expect(dispatcher.mode).toBe(DispatchMode.BLOCKING);
    });

    it("should treat a marked promise-returning handler as cooperative", () => {
      const handler = markCooperative(() => Promise.resolve(response));

      expect(new BareDispatcher(handler).mode).toBe(DispatchMode.COOPERATIVE);
    });
  });

  describe("handle", () => {
    it("should route to the path fixed at construction", async () => {
      const blocking = new RecordingDispatcher(() => response);
      const cooperative = new RecordingDispatcher(async () => response);

      blocking.handle(request);
      blocking.handle(request);
      await cooperative.handle(request);

      expect(blocking.paths).toEqual(["blocking", "blocking"]);
      expect(cooperative.paths).toEqual(["cooperative"]);
    });

    it("should reject a missing blocking path", () => {
      const dispatcher = new BareDispatcher(() => response);

      expect(() => dispatcher.handle(request)).toThrow(NotImplementedException);
    });

    it("should reject a missing cooperative path", async () => {
      const dispatcher = new BareDispatcher(async () => response);

      await expect(dispatcher.handle(request)).rejects.toThrow(
        "BareDispatcher does not implement handleCooperative()",
      );
    });
  });

  it("should describe itself with its handler and mode", () => {
    function renderReport(): InstrumentedResponse {
      return response;
    }

    expect(String(new BareDispatcher(renderReport))).toBe(
      "<BareDispatcher handler=renderReport mode=BLOCKING>",
    );
  });
});
