export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as CommandRunner from "./command_runner";
export * as Git from "./git";
export * as Parser from "./changelog_parser";
export * as Pipeline from "./changelog_pipeline";
export * as Store from "./changelog_store";
export * as Generator from "./changelog_generator";
export * as Logger from "./logger";
export * as Errors from "./errors";
