import { Command, Options } from "@effect/cli";
import { FetchHttpClient, HttpServer } from "@effect/platform";
import {
  NodeContext,
  NodeHttpServer,
  NodeRuntime,
} from "@effect/platform-node";
import { createServer } from "node:http";
import process from "node:process";
import { Config, Console, Effect, Layer } from "effect";
import type { QuoteSourceError } from "./src/quote-source.ts";
import { HiStockLive } from "./src/providers/histock.ts";
import { QuoteSourceTestLive } from "./src/providers/quote-source-mock.ts";
import { IndexFeedLive } from "./src/index-feed.ts";
import { ApiApp } from "./src/http-api.ts";
import { fetchSnapshot } from "./src/quote-command.ts";
import { formatError, formatSnapshot } from "./src/format.ts";

// --- CLI ---

const port = Options.integer("port").pipe(
  Options.withDescription("Port for the HTTP API"),
  Options.withFallbackConfig(Config.integer("PORT").pipe(Config.withDefault(5001))),
);

const host = Options.text("host").pipe(
  Options.withDescription("Address to bind the HTTP API to"),
  Options.withFallbackConfig(Config.string("HOST").pipe(Config.withDefault("0.0.0.0"))),
);

const serve = Command.make("serve", { port, host }).pipe(
  Command.withDescription("Keep the FTSE Taiwan snapshot fresh and serve it over HTTP"),
  Command.withHandler(({ port, host }) =>
    ApiApp.pipe(
      HttpServer.serve(),
      HttpServer.withLogAddress,
      Layer.provide(IndexFeedLive),
      Layer.provide(NodeHttpServer.layer(() => createServer(), { port, host })),
      Layer.launch,
    )
  ),
);

const quote = Command.make("quote", {}).pipe(
  Command.withDescription("Fetch the FTSE Taiwan index once and print it"),
  Command.withHandler(() =>
    fetchSnapshot.pipe(
      Effect.flatMap((snapshot) => Console.log(formatSnapshot(snapshot))),
    )
  ),
);

const command = Command.make("ftse-feed").pipe(
  Command.withSubcommands([serve, quote]),
);

// --- Layers ---
// Set QUOTE_PROVIDER to "histock" (default) or "test".

const QuoteSourceLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("QUOTE_PROVIDER").pipe(
      Config.withDefault("histock"),
    );
    switch (provider) {
      case "test":
        return QuoteSourceTestLive;
      default:
        return HiStockLive;
    }
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "ftse-feed",
  version: "0.1.0",
});

const logSourceError = (e: QuoteSourceError) => Console.error(formatError(e));

cli(process.argv).pipe(
  Effect.catchTags({
    NetworkError: logSourceError,
    HttpError: logSourceError,
    ParseError: logSourceError,
    ValueError: logSourceError,
  }),
  Effect.provide(QuoteSourceLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
