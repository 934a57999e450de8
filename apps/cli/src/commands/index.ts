import { defineCommand } from "citty";
import { getVersion } from "../utils/version.js";

export const main = defineCommand({
  meta: {
    name: "premerge",
    version: getVersion(),
    description: "Report CI build and test failures on pull requests",
  },
  subCommands: {
    report: () => import("./report.js").then((m) => m.reportCommand),
    explain: () => import("./explain.js").then((m) => m.explainCommand),
    publish: () => import("./publish.js").then((m) => m.publishCommand),
    upload: () => import("./upload.js").then((m) => m.uploadCommand),
    version: () => import("./version.js").then((m) => m.versionCommand),
  },
});
