import { Console, Layer } from "effect";
import { formatReport } from "./format.ts";
import { Reporter } from "./screener-api.ts";

export const ConsoleReporterLive = Layer.succeed(
  Reporter,
  Reporter.of({
    report: (report) => Console.log(formatReport(report)),
  }),
);
