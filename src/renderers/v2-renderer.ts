import { restructureDevice } from "../restructure.js";
import type { Renderer } from "./renderer.js";

export const v2Renderer = {
  format: "v2",
  extension: "v2.json",
  render: (record, ctx) => `${JSON.stringify(restructureDevice(record, { now: ctx.now }), null, 2)}\n`,
} satisfies Renderer;
