import type { StageContract } from '@domain/ports/stage.js';
import type { IDataProvider } from '@domain/ports/data-provider.js';
import type { SkillVocabulary } from '@domain/types/skills.js';
import { createPerceptionStage } from './perception-stage.js';
import { createAnalysisStage } from './analysis-stage.js';
import { createDecisionStage } from './decision-stage.js';

export interface BuiltinStageDeps {
  vocabulary: SkillVocabulary;
  dataProvider: IDataProvider;
  requiredHeadcount: number;
}

/** Perception, analysis and decision, in pipeline order. */
export function createBuiltinStages(deps: BuiltinStageDeps): StageContract[] {
  return [
    createPerceptionStage({ vocabulary: deps.vocabulary }),
    createAnalysisStage(deps),
    createDecisionStage({ vocabulary: deps.vocabulary, dataProvider: deps.dataProvider }),
  ];
}
