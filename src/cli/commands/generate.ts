/**
 * Generate command handler for the glbindgen CLI.
 *
 * Loads configuration (flags > env > file > defaults), reads the registry,
 * generates bindings and writes them to the output file or stdout.
 */

import { generateBindings } from '../../bindings/generate.js';
import { readRegistryFile, writeBindings } from '../../bindings/io.js';
import { mergeConfig } from '../../config/env.js';
import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/types.js';
import { assertConfigValid, type PathCheckResult } from '../../config/validator.js';
import { parseGeneratorName } from '../../generators/factory.js';
import { parseNamespace } from '../../registry/namespaces.js';
import { selectionToFilter } from '../../resolver/filter.js';
import { parseUnknownExtensionPolicy } from '../../resolver/resolver.js';
import { Logger } from '../../utils/logger.js';
import { safeExistsSync, safeStatSync } from '../../utils/safe-fs.js';
import { parseGenerateArgs } from '../args.js';
import type { CliCommandResult, CliContext } from '../types.js';

export const GENERATE_HELP = `
USAGE: glbindgen generate [options]

Generates TypeScript bindings from a Khronos XML registry or a TOML record
document. Options override GLBINDGEN_* environment variables, which override
glbindgen.toml.

OPTIONS:
  --config <file>               Configuration file (default: ./glbindgen.toml)
  --registry <file>             Registry document (.xml or .toml)
  --api <namespace>             gl, gles1, gles2, glx, wgl or egl
  --profile <profile>           core or compatibility
  --api-version <version>       API version, e.g. 4.5
  --generator <style>           global, struct, static_struct or static
  --extension <name>            Extension to include (repeatable)
  --full                        Include every record of the registry
  --out <file>                  Output file (default: stdout)
  --runtime-module <module>     Module generated code imports its runtime from
  --unknown-extensions <policy> ignore, warn or error
  --no-verify                   Skip syntax verification of the output
  --debug                       Write debug log entries

EXAMPLES:
  glbindgen generate --registry gl.xml --api-version 4.5 --generator global
  glbindgen generate --registry egl.xml --api egl --api-version 1.5 --out src/egl.ts
`;

function checkRegistryPath(filePath: string): PathCheckResult {
  if (!safeExistsSync(filePath)) {
    return { exists: false };
  }
  return { exists: true, isDirectory: safeStatSync(filePath).isDirectory() };
}

/**
 * Resolves the effective configuration of one invocation.
 *
 * @throws ConfigParseError, EnvCoercionError, ConfigValidationError or CliArgumentError.
 */
export async function resolveGenerateConfig(context: CliContext): Promise<Config | undefined> {
  const args = parseGenerateArgs(context.args, context.cwd);
  if (args.help) {
    return undefined;
  }
  const fileConfig = await loadConfig({ path: args.configPath, cwd: context.cwd, env: context.env });
  const config = mergeConfig(fileConfig, args.overrides);
  assertConfigValid(config, { pathChecker: checkRegistryPath });
  return config;
}

/**
 * Handles the generate command.
 */
export async function handleGenerateCommand(context: CliContext): Promise<CliCommandResult> {
  const config = await resolveGenerateConfig(context);
  if (config === undefined) {
    console.log(GENERATE_HELP);
    return { exitCode: 0 };
  }

  const logger = new Logger({ component: 'glbindgen', debugMode: config.logging.debug });
  const namespace = parseNamespace(config.bindings.api);
  const filter = selectionToFilter({
    namespace,
    profile: config.bindings.profile,
    version: config.bindings.version,
    extensions: config.bindings.extensions,
    full: config.bindings.full,
  });
  const registryPath = config.registry.path ?? '';
  logger.debug('config_resolved', {
    registry: registryPath,
    namespace,
    generator: config.bindings.generator,
    full: filter === null,
  });

  const raw = await readRegistryFile(registryPath, namespace, logger);
  const result = generateBindings({
    registry: raw,
    filter,
    generator: parseGeneratorName(config.bindings.generator),
    runtimeModule: config.output.runtime_module,
    unknownExtensions: parseUnknownExtensionPolicy(config.resolver.unknown_extensions),
    verify: config.output.verify,
    logger,
  });

  if (config.output.path === undefined) {
    process.stdout.write(result.source);
  } else {
    await writeBindings(result.source, config.output.path, logger);
  }
  return { exitCode: 0 };
}
