/**
 * Orchestrator
 *
 * Runs the pipeline: asks the decision maker for the next tool, runs it,
 * records what it produced, and repeats until every tool has run.
 */

import type { Logger } from 'pino';
import {
  Artifact,
  ArtifactName,
  Decision,
  InputPayload,
  OutputFormat,
  PipelineState,
  ResumeMaturity,
  SkippedOutput,
  ToolName,
  createPipelineState
} from '../types';
import { InputProcessor } from '../tools/inputProcessor';
import { TextModifier } from '../tools/textModifier';
import { ResumeGenerator } from '../tools/resumeGenerator';
import { DecisionMaker } from './decisionMaker';
import { analyzeMaturity } from './maturity';
import { ErrorHandler } from '../shared/errors';
import { loggers } from '../shared/logger';

export const DEFAULT_MAX_STEPS = 6;

export interface RunRequest {
  payload: InputPayload;
  outputDir: string;
  formats: OutputFormat[];
  candidateName?: string;
  targetRole?: string;
  locale?: string;
  /** Skips classification when set */
  maturity?: ResumeMaturity;
  template?: string;
}

export interface RunResult {
  state: PipelineState;
  /** Every artifact, in the order it was produced */
  artifacts: Artifact[];
  skipped: SkippedOutput[];
  decisions: Decision[];
}

export interface OrchestratorDependencies {
  inputProcessor: InputProcessor;
  textModifier: TextModifier;
  resumeGenerator: ResumeGenerator;
  decisionMaker: DecisionMaker;
  maxSteps?: number;
  logger?: Logger;
}

export class Orchestrator {
  private deps: OrchestratorDependencies;
  private maxSteps: number;
  private log: Logger;

  constructor(deps: OrchestratorDependencies) {
    this.deps = deps;
    this.maxSteps = deps.maxSteps ?? DEFAULT_MAX_STEPS;
    this.log = deps.logger ?? loggers.orchestrator;
  }

  /**
   * @throws AppError from the failing tool, or UNEXPECTED when the step limit is hit
   */
  async run(request: RunRequest): Promise<RunResult> {
    const state = createPipelineState(request.outputDir);
    const produced: Artifact[] = [];
    const skipped: SkippedOutput[] = [];

    for (let step = 1; ; step++) {
      const decision = await this.deps.decisionMaker.decide(state);
      state.decisions.push(decision);

      if (decision.status === 'done' || decision.next === null) {
        break;
      }

      if (step > this.maxSteps) {
        throw ErrorHandler.createUnexpectedError(
          new Error(`Pipeline did not finish within ${this.maxSteps} steps`),
          { completed: [...state.completed], next: decision.next }
        );
      }

      const tool = decision.next;
      this.log.info(
        { step, tool, source: decision.source, todo: decision.todo.map(entry => entry.tool) },
        `Running ${tool}`
      );

      const artifacts = await this.runTool(tool, state, request, skipped);
      for (const artifact of artifacts) {
        state.artifacts.set(artifact.name, artifact);
        produced.push(artifact);
      }
      state.completed.add(tool);
    }

    this.log.info(
      { steps: state.decisions.length - 1, artifacts: produced.map(a => a.name), skipped: skipped.length },
      'Pipeline finished'
    );

    return { state, artifacts: produced, skipped, decisions: state.decisions };
  }

  private async runTool(
    tool: ToolName,
    state: PipelineState,
    request: RunRequest,
    skipped: SkippedOutput[]
  ): Promise<Artifact[]> {
    switch (tool) {
      case 'run_input_processor': {
        const input = await this.deps.inputProcessor.process(request.payload);
        state.currentText = input.markdown;

        if (request.maturity) {
          state.maturity = request.maturity;
        } else {
          const report = analyzeMaturity(input.markdown);
          state.maturity = report.maturity;
          this.log.info(
            { maturity: report.maturity, sections: report.sections, bullets: report.bulletCount },
            'Classified input'
          );
        }

        return [{ name: 'markdown', kind: 'markdown', producedBy: tool, content: input.markdown }];
      }

      case 'run_text_modifier': {
        const markdown = this.requireContent(state, 'markdown', tool);
        const result = await this.deps.textModifier.modify({
          markdown,
          maturity: state.maturity ?? analyzeMaturity(markdown).maturity,
          targetRole: request.targetRole,
          locale: request.locale
        });
        state.currentText = result.markdown;
        return [{ name: 'polished_markdown', kind: 'markdown', producedBy: tool, content: result.markdown }];
      }

      case 'run_resume_generator': {
        const markdown = this.requireContent(state, 'polished_markdown', tool);
        const result = await this.deps.resumeGenerator.generate({
          markdown,
          outputDir: state.outputDir,
          formats: request.formats,
          candidateName: request.candidateName,
          template: request.template
        });
        skipped.push(...result.skipped);
        return result.artifacts;
      }
    }
  }

  private requireContent(state: PipelineState, name: ArtifactName, tool: ToolName): string {
    const content = state.artifacts.get(name)?.content;
    if (content === undefined) {
      throw ErrorHandler.createUnexpectedError(
        new Error(`${tool} needs the ${name} artifact, which has not been produced`),
        { tool, missing: name }
      );
    }
    return content;
  }
}
