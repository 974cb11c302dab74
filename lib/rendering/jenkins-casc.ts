import * as yaml from 'js-yaml';
import { groovyString } from './jenkinsfile';

/**
 * Plugins every platform Jenkins controller gets before first start.
 * `prometheus` exposes /prometheus for the monitoring host to scrape.
 */
export const JENKINS_PLUGINS = [
  'configuration-as-code',
  'job-dsl',
  'workflow-aggregator',
  'git',
  'timestamper',
  'pipeline-stage-view',
  'prometheus',
];

export interface SeedJob {
  readonly name: string;
  /** Jenkinsfile on the controller's disk the job runs */
  readonly jenkinsfilePath: string;
}

export interface JenkinsCascOptions {
  readonly systemMessage: string;
  readonly adminUser?: string;
  /** Environment variable holding the admin password at runtime */
  readonly adminPasswordVariable: string;
  readonly executors?: number;
  readonly seedJob?: SeedJob;
}

function seedJobScript(job: SeedJob): string {
  return [
    `pipelineJob(${groovyString(job.name)}) {`,
    '  definition {',
    '    cps {',
    `      script(new File(${groovyString(job.jenkinsfilePath)}).text)`,
    '      sandbox(true)',
    '    }',
    '  }',
    '}',
  ].join('\n');
}

/**
 * jenkins.yaml for the configuration-as-code plugin. The password stays a
 * `${VAR}` reference that the plugin resolves from the service environment.
 */
export function renderJenkinsCasc(options: JenkinsCascOptions): string {
  const casc: Record<string, unknown> = {
    jenkins: {
      systemMessage: options.systemMessage,
      numExecutors: options.executors ?? 2,
      mode: 'NORMAL',
      securityRealm: {
        local: {
          allowsSignup: false,
          users: [{ id: options.adminUser ?? 'admin', password: `\${${options.adminPasswordVariable}}` }],
        },
      },
      authorizationStrategy: {
        loggedInUsersCanDoAnything: { allowAnonymousRead: false },
      },
    },
    unclassified: {
      prometheusConfiguration: {
        path: 'prometheus',
        useAuthenticatedEndpoint: false,
        collectingMetricPeriodInSeconds: 120,
      },
    },
  };
  if (options.seedJob !== undefined) {
    casc.jobs = [{ script: seedJobScript(options.seedJob) }];
  }
  return yaml.dump(casc, { lineWidth: -1, noRefs: true });
}
