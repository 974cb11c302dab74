import { RenderError } from '../errors';

const FILE = 'Jenkinsfile';

/**
 * A single pipeline step. Plain strings are shell commands; objects allow
 * the other step kinds the platform pipeline needs.
 */
export type PipelineStep =
  | string
  | { readonly checkout: 'scm' }
  | { readonly git: string; readonly branch: string }
  | { readonly echo: string };

export interface StageCondition {
  /** Only run on this branch */
  readonly branch: string;
}

/**
 * Rendered as the stage's `input` directive: the stage waits for a person
 * to confirm before any of its steps run.
 */
export interface StageApproval {
  readonly message: string;
  readonly ok?: string;
}

export interface PipelineStage {
  readonly name: string;
  readonly steps: PipelineStep[];
  readonly when?: StageCondition;
  readonly approval?: StageApproval;
}

export interface JenkinsfileOptions {
  readonly stages: PipelineStage[];
  readonly environment?: Record<string, string>;
  readonly timeoutMinutes?: number;
  /** Artifacts archived after every run, e.g. `tfplan` */
  readonly archive?: string[];
}

export interface TerraformPipelineOptions {
  /** Path of the backend.hcl written on the Jenkins host */
  readonly backendConfigPath: string;
  readonly requireApproval: boolean;
  readonly workingDirectory?: string;
  /** Clone this repository instead of using the job's own SCM */
  readonly repository?: { readonly url: string; readonly branch: string };
}

/**
 * Quotes a value as a single-quoted Groovy string, so `$` is never
 * interpolated by Groovy.
 */
export function groovyString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function renderStep(step: PipelineStep): string {
  if (typeof step === 'string') {
    return `sh ${groovyString(step)}`;
  }
  if ('checkout' in step) {
    return 'checkout scm';
  }
  if ('git' in step) {
    return `git url: ${groovyString(step.git)}, branch: ${groovyString(step.branch)}`;
  }
  return `echo ${groovyString(step.echo)}`;
}

function indent(lines: string[], depth: number): string[] {
  const pad = '    '.repeat(depth);
  return lines.map(line => (line === '' ? line : `${pad}${line}`));
}

function renderStage(stage: PipelineStage): string[] {
  if (stage.steps.length === 0) {
    throw new RenderError(FILE, `stage '${stage.name}' has no steps`);
  }
  const body: string[] = [];
  if (stage.when !== undefined) {
    body.push('when {', ...indent([`branch ${groovyString(stage.when.branch)}`], 1), '}');
  }
  if (stage.approval !== undefined) {
    const input = [`message ${groovyString(stage.approval.message)}`];
    if (stage.approval.ok !== undefined) {
      input.push(`ok ${groovyString(stage.approval.ok)}`);
    }
    body.push('input {', ...indent(input, 1), '}');
  }
  body.push('steps {', ...indent(stage.steps.map(renderStep), 1), '}');
  return [`stage(${groovyString(stage.name)}) {`, ...indent(body, 1), '}'];
}

/**
 * Stages for a Terraform delivery pipeline: init against the S3 backend,
 * validate, plan to a file, optionally wait for a human, then apply that
 * exact plan.
 */
export function terraformPipelineStages(options: TerraformPipelineOptions): PipelineStage[] {
  const cd = options.workingDirectory === undefined ? '' : `cd ${options.workingDirectory} && `;
  const stages: PipelineStage[] = [
    {
      name: 'Checkout',
      steps: [options.repository === undefined
        ? { checkout: 'scm' }
        : { git: options.repository.url, branch: options.repository.branch }],
    },
    {
      name: 'Terraform Init',
      steps: [`${cd}terraform init -input=false -backend-config=${options.backendConfigPath}`],
    },
    {
      name: 'Terraform Validate',
      steps: [`${cd}terraform fmt -check -recursive`, `${cd}terraform validate`],
    },
    { name: 'Terraform Plan', steps: [`${cd}terraform plan -input=false -out=tfplan`] },
  ];
  if (options.requireApproval) {
    stages.push({
      name: 'Approval',
      approval: { message: 'Apply this Terraform plan?', ok: 'Apply' },
      steps: [{ echo: 'Terraform plan approved' }],
    });
  }
  stages.push({ name: 'Terraform Apply', steps: [`${cd}terraform apply -input=false tfplan`] });
  return stages;
}

export function renderJenkinsfile(options: JenkinsfileOptions): string {
  if (options.stages.length === 0) {
    throw new RenderError(FILE, 'a pipeline needs at least one stage');
  }
  const names = new Set<string>();
  for (const stage of options.stages) {
    if (names.has(stage.name)) {
      throw new RenderError(FILE, `duplicate stage '${stage.name}'`);
    }
    names.add(stage.name);
  }

  const body: string[] = ['agent any', ''];

  body.push('options {', ...indent([
    `timeout(time: ${options.timeoutMinutes ?? 60}, unit: 'MINUTES')`,
    'disableConcurrentBuilds()',
    'timestamps()',
  ], 1), '}', '');

  const environment = Object.entries(options.environment ?? {});
  if (environment.length > 0) {
    body.push('environment {', ...indent(environment.map(([key, value]) => `${key} = ${groovyString(value)}`), 1), '}', '');
  }

  body.push('stages {', ...indent(options.stages.flatMap(renderStage), 1), '}');

  if (options.archive && options.archive.length > 0) {
    body.push('', 'post {', ...indent([
      'always {',
      ...indent([`archiveArtifacts artifacts: ${groovyString(options.archive.join(','))}, allowEmptyArchive: true`], 1),
      '}',
    ], 1), '}');
  }

  return ['pipeline {', ...indent(body, 1), '}', ''].join('\n');
}
