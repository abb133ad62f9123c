import fs from 'node:fs'
import path from 'node:path'
import yaml from 'yaml'
import { z } from 'zod'

export interface JotlineCliConfig {
  dataDir: string
  databasePath: string
  credentialsPath: string
  /** Config file that was read, if any. */
  configFile?: string
}

const DEFAULT_CONFIG_FILENAMES = ['jotline.config.json', 'jotline.config.yaml', 'jotline.config.yml']

export const ConfigFileSchema = z
  .object({
    dataDir: z.string().min(1).optional(),
    databaseFile: z.string().min(1).default('jotline.db'),
    credentialsFile: z.string().min(1).default('users.txt'),
  })
  .strict()

/**
 * Resolve paths from, in order: JOTLINE_HOME / JOTLINE_DB, a config file in `cwd`, defaults.
 * Relative paths resolve against `cwd`, or against the data directory for file names.
 * Throws when a config file is unreadable or has unknown or invalid keys.
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): JotlineCliConfig {
  const configFile = findConfigFile(cwd)
  const fileConfig = ConfigFileSchema.safeParse(configFile ? readConfigFile(configFile) : {})
  if (!fileConfig.success) {
    const issues = fileConfig.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
    throw new Error(`Invalid config ${configFile ?? ''}: ${issues.join('; ')}`)
  }

  const dataDir = path.resolve(cwd, env['JOTLINE_HOME'] || fileConfig.data.dataDir || '.')
  const envDb = env['JOTLINE_DB']
  const config: JotlineCliConfig = {
    dataDir,
    databasePath: envDb ? resolveDatabasePath(cwd, envDb) : path.resolve(dataDir, fileConfig.data.databaseFile),
    credentialsPath: path.resolve(dataDir, fileConfig.data.credentialsFile),
  }
  if (configFile) {
    config.configFile = configFile
  }
  return config
}

/** `notes_<user>.txt` in the data directory. */
export function defaultLegacyTextPath(config: JotlineCliConfig, user: string): string {
  return path.join(config.dataDir, `notes_${user}.txt`)
}

/** `<user>_notes_export.json` in the data directory. */
export function defaultJsonExportPath(config: JotlineCliConfig, user: string): string {
  return path.join(config.dataDir, `${user}_notes_export.json`)
}

function readConfigFile(configPath: string): unknown {
  const content = fs.readFileSync(configPath, 'utf8')
  if (configPath.endsWith('.json')) {
    return JSON.parse(content)
  }
  return yaml.parse(content) ?? {}
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename)
    if (fs.existsSync(fullPath)) {
      return fullPath
    }
  }
  return undefined
}

function resolveDatabasePath(cwd: string, value: string): string {
  return value === ':memory:' ? value : path.resolve(cwd, value)
}
