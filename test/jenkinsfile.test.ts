import { groovyString, renderJenkinsfile, terraformPipelineStages } from '../lib/rendering/jenkinsfile';

describe('groovyString', () => {
  test('quotes plain values', () => {
    expect(groovyString('make build')).toBe("'make build'");
  });

  test('escapes quotes and backslashes', () => {
    expect(groovyString("it's")).toBe("'it\\'s'");
    expect(groovyString('C:\\tmp')).toBe("'C:\\\\tmp'");
  });

  test('leaves dollar signs alone', () => {
    expect(groovyString('echo $HOME')).toBe("'echo $HOME'");
  });
});

describe('renderJenkinsfile', () => {
  test('renders a declarative pipeline', () => {
    expect(renderJenkinsfile({ stages: [{ name: 'Build', steps: ['make'] }] })).toBe([
      'pipeline {',
      '    agent any',
      '',
      '    options {',
      "        timeout(time: 60, unit: 'MINUTES')",
      '        disableConcurrentBuilds()',
      '        timestamps()',
      '    }',
      '',
      '    stages {',
      "        stage('Build') {",
      '            steps {',
      "                sh 'make'",
      '            }',
      '        }',
      '    }',
      '}',
      '',
    ].join('\n'));
  });

  test('renders environment, branch conditions and archived artifacts', () => {
    const lines = renderJenkinsfile({
      stages: [
        { name: 'Deploy', steps: [{ echo: 'deploying' }, 'terraform apply -input=false tfplan'], when: { branch: 'main' } },
      ],
      environment: { AWS_REGION: 'us-east-1' },
      timeoutMinutes: 30,
      archive: ['tfplan', 'plan.txt'],
    }).split('\n');

    expect(lines).toContain("        timeout(time: 30, unit: 'MINUTES')");
    expect(lines).toContain('    environment {');
    expect(lines).toContain("        AWS_REGION = 'us-east-1'");
    expect(lines).toContain('            when {');
    expect(lines).toContain("                branch 'main'");
    expect(lines).toContain("                echo 'deploying'");
    expect(lines).toContain("                sh 'terraform apply -input=false tfplan'");
    expect(lines).toContain("            archiveArtifacts artifacts: 'tfplan,plan.txt', allowEmptyArchive: true");
  });

  test('rejects a pipeline without stages', () => {
    expect(() => renderJenkinsfile({ stages: [] })).toThrow('Jenkinsfile: a pipeline needs at least one stage');
  });

  test('rejects duplicate stage names', () => {
    expect(() => renderJenkinsfile({
      stages: [{ name: 'Plan', steps: ['a'] }, { name: 'Plan', steps: ['b'] }],
    })).toThrow("Jenkinsfile: duplicate stage 'Plan'");
  });

  test('renders the condition before the input directive', () => {
    const rendered = renderJenkinsfile({
      stages: [{
        name: 'Release',
        when: { branch: 'main' },
        approval: { message: "Ship it's build?" },
        steps: ['make release'],
      }],
    });

    expect(rendered).toContain([
      "        stage('Release') {",
      '            when {',
      "                branch 'main'",
      '            }',
      '            input {',
      "                message 'Ship it\\'s build?'",
      '            }',
      '            steps {',
    ].join('\n'));
  });

  test('rejects a stage without steps', () => {
    expect(() => renderJenkinsfile({ stages: [{ name: 'Empty', steps: [] }] }))
      .toThrow("Jenkinsfile: stage 'Empty' has no steps");
  });
});

describe('terraformPipelineStages', () => {
  test('plans, waits for approval and applies the saved plan', () => {
    const stages = terraformPipelineStages({ backendConfigPath: '/var/lib/jenkins/terraform/backend.hcl', requireApproval: true });

    expect(stages.map(stage => stage.name)).toEqual([
      'Checkout',
      'Terraform Init',
      'Terraform Validate',
      'Terraform Plan',
      'Approval',
      'Terraform Apply',
    ]);
    expect(stages[0].steps).toEqual([{ checkout: 'scm' }]);
    expect(stages[1].steps).toEqual(['terraform init -input=false -backend-config=/var/lib/jenkins/terraform/backend.hcl']);
    expect(stages[4].approval).toEqual({ message: 'Apply this Terraform plan?', ok: 'Apply' });
    expect(stages[5].steps).toEqual(['terraform apply -input=false tfplan']);
  });

  test('skips approval and clones a configured repository', () => {
    const stages = terraformPipelineStages({
      backendConfigPath: 'backend.hcl',
      requireApproval: false,
      workingDirectory: 'infra',
      repository: { url: 'https://example.com/infra.git', branch: 'main' },
    });

    expect(stages.map(stage => stage.name)).not.toContain('Approval');
    expect(stages[0].steps).toEqual([{ git: 'https://example.com/infra.git', branch: 'main' }]);
    expect(stages[3].steps).toEqual(['cd infra && terraform plan -input=false -out=tfplan']);

    const lines = renderJenkinsfile({ stages }).split('\n');
    expect(lines).toContain("                git url: 'https://example.com/infra.git', branch: 'main'");
  });

  test('gates the approval stage with an input directive', () => {
    const lines = renderJenkinsfile({
      stages: terraformPipelineStages({ backendConfigPath: 'backend.hcl', requireApproval: true }),
    }).split('\n');

    const stageLine = lines.indexOf("        stage('Approval') {");
    expect(lines.slice(stageLine, stageLine + 9)).toEqual([
      "        stage('Approval') {",
      '            input {',
      "                message 'Apply this Terraform plan?'",
      "                ok 'Apply'",
      '            }',
      '            steps {',
      "                echo 'Terraform plan approved'",
      '            }',
      '        }',
    ]);
    expect(lines).toContain('                checkout scm');
  });
});
