#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Logger, LogLevel } from "effect"
import { PriceAnalyzer } from './app.js';
import { AppConfig } from './config.js';
import { PriceSource } from './price-source/types.js';
import { serviceLayers } from './layers.js';

const isProd = process.env.NODE_ENV == 'production';


const program = Effect.gen(function*() {
  const analyzer = new PriceAnalyzer(
    yield* PriceSource,
    {
      windowDurationHours: yield* AppConfig.search.windowDurationHours,
      referenceHour: yield* AppConfig.search.referenceHour,
    },
  );

  yield* analyzer.run();
}).pipe(
  Effect.provide(serviceLayers),
  Effect.provide(NodeContext.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
