import { handler } from "../nodejs/health";

describe("health handler", () => {
  it("reports ok", async () => {
    const res = await handler();

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body ?? "")).toEqual({ status: "ok" });
  });
});
