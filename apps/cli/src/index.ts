import process from "node:process";

import dotenv from "dotenv";

import { OpenAICompatibleClient } from "@estate-lens/chat-core";

import { createCliApplication } from "./cliApplication.js";
import { CommandRouter } from "./commandRouter.js";
import { createConfigCommandDescriptor } from "./commands/configCommand.js";
import { createCostCommandDescriptor } from "./commands/costCommand.js";
import { createParseCommandDescriptor } from "./commands/parseCommand.js";
import {
  createImagesCommandDescriptor,
  createSearchCommandDescriptor,
  type SearchCommandDependencies,
} from "./commands/searchCommand.js";
import { ConfigService } from "./config/configService.js";
import { resolveConfigFilePath } from "./config/configPaths.js";
import { ConfigStore } from "./config/configStore.js";
import { InputResolver } from "./inputResolver.js";
import { createNodeProcessIO, registerProcessObservers } from "./processIo.js";

async function main(): Promise<void> {
  dotenv.config();
  registerProcessObservers(process);

  const configFilePath = resolveConfigFilePath();
  const configStore = new ConfigStore(configFilePath);
  const configService = new ConfigService(configStore, process.env);
  await configService.initialize();

  const searchDeps: SearchCommandDependencies = {
    inputResolver: new InputResolver(),
    profiles: configService,
    llmFactory: (options) =>
      new OpenAICompatibleClient(options.baseUrl, options.apiKey, options.model, {
        timeoutMs: options.timeoutMs,
      }),
  };

  const router = new CommandRouter();
  router.register(createSearchCommandDescriptor(searchDeps));
  router.register(createImagesCommandDescriptor(searchDeps));
  router.register(createParseCommandDescriptor({ inputResolver: new InputResolver() }));
  router.register(createCostCommandDescriptor());
  router.register(createConfigCommandDescriptor({ configService }));

  const app = createCliApplication({
    name: "estate-lens",
    description: "Property pricing, builder, amenity and image lookup through a chat-completion model",
    router,
  });

  const io = createNodeProcessIO(process);
  const exitCode = await app.run(process.argv, io);

  if (typeof process.exitCode !== "number") {
    process.exitCode = exitCode;
  }
}

main().catch((error: unknown) => {
  console.error("estate-lens: fatal error", error);
  process.exitCode = 1;
});
