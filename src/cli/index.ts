#!/usr/bin/env node
import { Command } from "commander";
import { APP_VERSION } from "../version";

const program = new Command()
  .name("router-bridge")
  .description("Local OpenAI-compatible bridge to a model-routing API")
  .version(APP_VERSION)
  .option("-c, --config <path>", "Config file path");

function globalOptions(command: Command): { config?: string } {
  return command.optsWithGlobals<{ config?: string }>();
}

program
  .command("init")
  .description("Create a config file and generate the storage master key")
  .option("--reset", "Overwrite an existing config")
  .option("--non-interactive", "Use defaults without prompting")
  .action(async (_options, command: Command) => {
    const { runInit } = await import("./commands/init");
    await runInit(command.optsWithGlobals());
  });

program
  .command("start")
  .description("Run the bridge in the foreground")
  .action(async (_options, command: Command) => {
    const { runStart } = await import("./commands/start");
    await runStart(globalOptions(command));
  });

const credentials = program.command("credentials").description("Manage the delegated API key");

credentials
  .command("status")
  .description("Show the locally stored credential")
  .action(async (_options, command: Command) => {
    const { credentialsStatus } = await import("./commands/credentials");
    await credentialsStatus(globalOptions(command));
  });

credentials
  .command("ensure")
  .description("Create the delegated key if none is stored")
  .option("--refresh", "Bypass the cached remote key list")
  .action(async (_options, command: Command) => {
    const { credentialsEnsure } = await import("./commands/credentials");
    await credentialsEnsure(command.optsWithGlobals());
  });

credentials
  .command("recreate")
  .description("Delete the bridge's remote keys and create a fresh one")
  .action(async (_options, command: Command) => {
    const { credentialsRecreate } = await import("./commands/credentials");
    await credentialsRecreate(globalOptions(command));
  });

credentials
  .command("list")
  .description("List remote keys visible to the provisioning key")
  .action(async (_options, command: Command) => {
    const { credentialsList } = await import("./commands/credentials");
    await credentialsList(globalOptions(command));
  });

credentials
  .command("set")
  .description("Store an API key entered by hand")
  .option("--value <value>", "Key value (prompted if omitted)")
  .action(async (_options, command: Command) => {
    const { credentialsSet } = await import("./commands/credentials");
    await credentialsSet(command.optsWithGlobals());
  });

credentials
  .command("clear")
  .description("Remove the locally stored key")
  .action(async (_options, command: Command) => {
    const { credentialsClear } = await import("./commands/credentials");
    await credentialsClear(globalOptions(command));
  });

const models = program.command("models").description("Inspect the model catalog");

models
  .command("refresh")
  .description("Fetch the catalog now")
  .action(async (_options, command: Command) => {
    const { modelsRefresh } = await import("./commands/models");
    await modelsRefresh(globalOptions(command));
  });

models
  .command("list")
  .description("List catalog models")
  .option("--supports <modality>", "Only models accepting image, audio, video or file input")
  .action(async (_options, command: Command) => {
    const { modelsList } = await import("./commands/models");
    await modelsList(command.optsWithGlobals());
  });

const favorites = program.command("favorites").description("Manage favorite models");

favorites
  .command("list")
  .description("Show favorites in order")
  .action(async (_options, command: Command) => {
    const { favoritesList } = await import("./commands/favorites");
    await favoritesList(globalOptions(command));
  });

favorites
  .command("add <modelId>")
  .description("Append a model to the favorites")
  .action(async (modelId: string, _options, command: Command) => {
    const { favoritesAdd } = await import("./commands/favorites");
    await favoritesAdd(modelId, globalOptions(command));
  });

favorites
  .command("remove <modelId>")
  .description("Remove a model from the favorites")
  .action(async (modelId: string, _options, command: Command) => {
    const { favoritesRemove } = await import("./commands/favorites");
    await favoritesRemove(modelId, globalOptions(command));
  });

favorites
  .command("move <from> <to>")
  .description("Move a favorite from one position to another")
  .action(async (from: string, to: string, _options, command: Command) => {
    const { favoritesMove } = await import("./commands/favorites");
    await favoritesMove(from, to, globalOptions(command));
  });

program.parse();
