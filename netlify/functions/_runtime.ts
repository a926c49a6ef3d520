import { env } from '../../src/config/env';
import { callbackUrlBuilder } from '../../src/lib/http/callbackAuth';
import { GenerationService } from '../../src/lib/generation/service';
import { CompletionBroker } from '../../src/lib/jobs/broker';
import { createLogger, type Logger } from '../../src/lib/logger';
import { HttpProviderGateway } from '../../src/lib/provider/http-gateway';
import { HttpModelRepository, type ModelHandle } from '../../src/lib/resources/http-repository';
import { ResourceSlot } from '../../src/lib/resources/slot';
import { S3ArtifactStore, createS3Client, type ArtifactCatalog } from '../../src/lib/storage/s3';

export interface Runtime {
  service: GenerationService<ModelHandle>;
  broker: CompletionBroker;
  slot?: ResourceSlot<ModelHandle>;
  artifacts?: ArtifactCatalog;
  logger: Logger;
}

let runtime: Runtime | null = null;

export function buildRuntime(): Runtime {
  const logger = createLogger({ level: env.LOG_LEVEL });

  const artifacts = env.STORAGE ? new S3ArtifactStore(createS3Client(env.STORAGE), env.STORAGE.R2_BUCKET) : undefined;

  const broker = new CompletionBroker({
    timings: env.TIMINGS,
    callbackUrlFor:
      env.PUBLIC_BASE_URL && env.CALLBACK_TOKEN ? callbackUrlBuilder(env.PUBLIC_BASE_URL, env.CALLBACK_TOKEN) : undefined,
    sink: artifacts,
    logger: logger.child({ component: 'broker' }),
  });

  const provider = new HttpProviderGateway({ baseUrl: env.PROVIDER_API_URL, apiKey: env.PROVIDER_API_KEY });

  let slot: ResourceSlot<ModelHandle> | undefined;
  let local: { slot: ResourceSlot<ModelHandle>; gateway: HttpProviderGateway } | undefined;
  if (env.LOCAL_RUNTIME_URL) {
    slot = new ResourceSlot(new HttpModelRepository({ baseUrl: env.LOCAL_RUNTIME_URL }), {
      logger: logger.child({ component: 'slot' }),
    });
    local = { slot, gateway: new HttpProviderGateway({ baseUrl: env.LOCAL_RUNTIME_URL }) };
  }

  const service = new GenerationService<ModelHandle>({ broker, provider, local, logger });
  return { service, broker, slot, artifacts, logger };
}

export function getRuntime(): Runtime {
  if (!runtime) {
    runtime = buildRuntime();
  }
  return runtime;
}
