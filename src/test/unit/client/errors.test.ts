import { expect } from "chai";
import { describe, it } from "mocha";

import {
  GatewayAuthError,
  GatewayConnectionError,
  GatewayError,
  GatewayTimeoutError,
  isGatewayError,
} from "../../../client/errors.js";

describe("Gateway errors", () => {
  it("tags each error with its kind and class name", () => {
    const cases: Array<[GatewayError, string, string]> = [
      [new GatewayAuthError("denied"), "auth", "GatewayAuthError"],
      [new GatewayConnectionError("down"), "connection", "GatewayConnectionError"],
      [new GatewayTimeoutError("slow"), "timeout", "GatewayTimeoutError"],
    ];

    for (const [error, kind, name] of cases) {
      expect(error.kind).to.equal(kind);
      expect(error.name).to.equal(name);
      expect(error).to.be.instanceOf(GatewayError);
      expect(error).to.be.instanceOf(Error);
    }
  });

  it("keeps the underlying cause", () => {
    const cause = new Error("connect ECONNREFUSED 127.0.0.1:1");
    const error = new GatewayConnectionError("Cannot reach gateway: connect ECONNREFUSED 127.0.0.1:1", { cause });

    expect(error.cause).to.equal(cause);
  });

  it("narrows unknown values", () => {
    expect(isGatewayError(new GatewayTimeoutError("slow"))).to.equal(true);
    expect(isGatewayError(new TypeError("bad body"))).to.equal(false);
    expect(isGatewayError("timeout")).to.equal(false);
  });
});
