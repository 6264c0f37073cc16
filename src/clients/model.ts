import { FRAMEWORK_LABELS } from '../schema/index.js';
import type { FrameworkLabel, ModelConfig } from '../schema/index.js';
import { ALL_CAPABILITIES } from './autogen.js';
import { defaultClientConstructors } from './constructors.js';
import type { ClientConstructors, ClientHandle } from './constructors.js';
import {
  requireResolvedConfig,
  toAutogenArgs,
  withConstructionErrors,
} from './factory.js';

/**
 * The LLM an agent generates responses and actions with: its config, the
 * constructed client and the framework that client belongs to.
 *
 * Use the static constructors; there is no way to change a model once built.
 */
export class Model {
  private constructor(
    readonly config: ModelConfig,
    private readonly client: ClientHandle,
    readonly framework: FrameworkLabel,
  ) {}

  static fromAzureOpenAIForAutogen(
    config: ModelConfig,
    constructors: Pick<ClientConstructors, 'autogen'> = defaultClientConstructors,
  ): Model {
    const resolved = requireResolvedConfig('autogen', config);
    const client = withConstructionErrors('autogen', () =>
      constructors.autogen({
        ...toAutogenArgs(resolved),
        modelCapabilities: ALL_CAPABILITIES,
      }),
    );

    return new Model(Object.freeze({ ...config }), client, FRAMEWORK_LABELS.autogen);
  }

  getClient(): ClientHandle {
    return this.client;
  }
}
