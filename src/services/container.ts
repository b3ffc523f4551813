import type { Settings } from '../config/settings';
import type { ArtifactStore } from '../store/artifact-store.interface';
import { ForcedAlignmentService } from './alignment/forced-alignment.service';
import { MultiTrackMixer } from './audio/multitrack-mixer.service';
import { SpeechTimelineBuilder } from './audio/speech-timeline.service';
import { createExternalClients, ExternalClients } from './generation/client-factory';
import { GenerationService } from './generation/generation.service';
import { ExportPipelineOrchestrator } from './pipeline/export-pipeline.orchestrator';

export interface ServiceContainer {
  store: ArtifactStore;
  clients: ExternalClients;
  generation: GenerationService;
  orchestrator: ExportPipelineOrchestrator;
}

/** Wire the export pipeline from settings; `clients` may be replaced with fakes. */
export function createServices(
  settings: Settings,
  store: ArtifactStore,
  clients: ExternalClients = createExternalClients(settings)
): ServiceContainer {
  const generation = new GenerationService(store, clients.providers, {
    concurrency: settings.generationConcurrency,
    timeouts: {
      speechMs: settings.timeouts.speechMs,
      musicMs: settings.timeouts.musicMs,
      effectMs: settings.timeouts.effectMs,
    },
    retry: settings.retry,
    defaultEffectDurationSec: settings.defaultEffectDurationSec,
  });

  const orchestrator = new ExportPipelineOrchestrator({
    store,
    timelineBuilder: new SpeechTimelineBuilder(clients.toolkit),
    alignment: new ForcedAlignmentService(clients.alignmentEngine, clients.toolkit, {
      timeoutMs: settings.timeouts.alignmentMs,
      retry: settings.retry,
    }),
    mixer: new MultiTrackMixer(clients.toolkit),
    generation,
    mixDefaults: settings.mixDefaults,
  });

  return { store, clients, generation, orchestrator };
}
