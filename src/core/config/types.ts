import { z } from 'zod';

export const PROJECT_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9]$/;

const MODULE_SEGMENT = '[a-zA-Z0-9][a-zA-Z0-9_.-]*[a-zA-Z0-9]';
export const MODULE_PATH_PATTERN = new RegExp(`^${MODULE_SEGMENT}/${MODULE_SEGMENT}/${MODULE_SEGMENT}$`);

export const ComponentId = z.enum(['cli', 'server', 'worker', 'docs', 'e2e']);
export type ComponentId = z.infer<typeof ComponentId>;

export const ProjectConfiguration = z.object({
  projectName: z.string(),
  modulePath: z.string(),
  description: z.string(),
  authorName: z.string(),
  authorEmail: z.string(),
  license: z.string(),
  enableCli: z.boolean(),
  enableServer: z.boolean(),
  enableWorker: z.boolean(),
  enableDocs: z.boolean(),
  enableE2eTests: z.boolean(),
  /** Empty string means no remote. */
  gitRemote: z.string()
});
export type ProjectConfiguration = Readonly<z.infer<typeof ProjectConfiguration>>;

/** Boolean fields of the configuration, used as template conditions. */
export type ComponentFlag = 'enableCli' | 'enableServer' | 'enableWorker' | 'enableDocs' | 'enableE2eTests';

export const COMPONENT_FLAGS: Record<ComponentId, ComponentFlag> = {
  cli: 'enableCli',
  server: 'enableServer',
  worker: 'enableWorker',
  docs: 'enableDocs',
  e2e: 'enableE2eTests'
};

export const COMPONENT_DEFAULTS: Readonly<Record<ComponentFlag, boolean>> = {
  enableCli: true,
  enableServer: true,
  enableWorker: false,
  enableDocs: true,
  enableE2eTests: false
};

/**
 * What the cloned template looks like. Defaults describe the Go service template;
 * a `.seedling.yaml` at the project root can override any field.
 */
export const TemplateProfile = z.object({
  templateName: z.string().min(1).default('go-template-project'),
  templateUrl: z.string().min(1).default('https://github.com/your-org/go-template-project'),
  placeholderModulePath: z.string().min(1).default('github.com/your-org/go-template-project'),
  manifestFile: z.string().min(1).default('go.mod'),
  languageVersion: z.string().min(1).default('1.23'),
  sourceExtension: z.string().min(1).default('.go'),
  selfTestFiles: z.array(z.string().min(1)).default(['tests/e2e/init_e2e_test.go']),
  componentTestFiles: z
    .object({
      cli: z.string().min(1),
      server: z.string().min(1),
      worker: z.string().min(1)
    })
    .default({
      cli: 'tests/e2e/cli_e2e_test.go',
      server: 'tests/e2e/server_e2e_test.go',
      worker: 'tests/e2e/worker_e2e_test.go'
    }),
  initializerFiles: z.array(z.string().min(1)).default(['scripts/init.go']),
  initializerDir: z.string().min(1).default('scripts'),
  docsPages: z
    .object({
      index: z.string().min(1),
      gettingStarted: z.string().min(1)
    })
    .default({
      index: 'docs/content/_index.md',
      gettingStarted: 'docs/content/docs/getting-started.md'
    })
});
export type TemplateProfile = z.infer<typeof TemplateProfile>;

export const DEFAULT_LICENSE = 'MIT';
export const DEFAULT_AUTHOR_NAME = 'Your Name';
export const DEFAULT_AUTHOR_EMAIL = 'your.email@example.com';
