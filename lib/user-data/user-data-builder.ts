/**
 * User Data Script Builder
 *
 * Fluent interface for the first-boot scripts of the platform hosts.
 * Operates directly on a CDK `ec2.UserData` object so that CDK Tokens
 * (instance private IPs, secret ARNs, bucket names) resolve through
 * CloudFormation's `Fn::Join` at deploy time.
 *
 * Install methods only lay down binaries, users and systemd units;
 * `startServices()` enables and starts them once every configuration file
 * has been written with `writeFile()`.
 *
 * @example
 * ```typescript
 * const userData = ec2.UserData.forLinux();
 * new UserDataBuilder(userData)
 *   .updateSystem()
 *   .installNodeExporter('1.8.1')
 *   .installPrometheus('2.53.0')
 *   .writeFile('/etc/prometheus/prometheus.yml', renderPrometheusConfig(options))
 *   .startServices('node_exporter', 'prometheus')
 *   .addCompletionMarker();
 * ```
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { RenderError } from '../errors';

export const HEREDOC_DELIMITER = 'PLATFORM_FILE_EOF';

export interface UserDataBuilderOptions {
  /**
   * Skip the bash preamble (strict mode and output logging).
   * @default false
   */
  readonly skipPreamble?: boolean;
  /** @default '/var/log/user-data.log' */
  readonly logFile?: string;
}

export interface WriteFileOptions {
  /** Octal permission string @default '0644' */
  readonly mode?: string;
  /** `user:group` owning the file */
  readonly owner?: string;
}

export interface SecretEnvironmentConfig {
  /** Secrets Manager secret name or ARN (supports CDK Tokens) */
  readonly secretId: string;
  readonly region: string;
  /** Variable name written to the environment file */
  readonly variable: string;
  /** systemd EnvironmentFile path */
  readonly envFile: string;
}

export interface SystemdServiceConfig {
  readonly name: string;
  readonly description: string;
  readonly execStart: string;
  readonly user?: string;
  readonly after?: string;
}

const ARCH = 'linux-amd64';

export class UserDataBuilder {
  private readonly userData: ec2.UserData;

  constructor(userData: ec2.UserData, options?: UserDataBuilderOptions) {
    this.userData = userData;

    if (!options?.skipPreamble) {
      this.userData.addCommands(
        'set -euxo pipefail',
        '',
        '# Log all output',
        `exec > >(tee ${options?.logFile ?? '/var/log/user-data.log'}) 2>&1`,
        '',
        'echo "=== User data script started at $(date) ==="',
      );
    }
  }

  updateSystem(): this {
    this.userData.addCommands(`
# Update system packages
dnf update -y`);
    return this;
  }

  installPackages(...packages: string[]): this {
    if (packages.length > 0) {
      this.userData.addCommands(`dnf install -y ${packages.join(' ')}`);
    }
    return this;
  }

  /**
   * Install AWS CLI v2 unless the AMI already ships it.
   */
  installAwsCli(): this {
    this.userData.addCommands(`
# Install AWS CLI v2
if ! command -v aws &> /dev/null; then
  echo "Installing AWS CLI v2..."
  curl -sSL "https://awscli.amazonaws.com/awscli-exe-linux-x86_64.zip" -o /tmp/awscliv2.zip
  unzip -q /tmp/awscliv2.zip -d /tmp
  /tmp/aws/install
  rm -rf /tmp/aws /tmp/awscliv2.zip
fi
echo "AWS CLI: $(aws --version)"`);
    return this;
  }

  /**
   * Write a file verbatim through a quoted heredoc, so the shell expands
   * nothing inside the content.
   */
  writeFile(path: string, content: string, options?: WriteFileOptions): this {
    const body = content.endsWith('\n') ? content.slice(0, -1) : content;
    if (body.split('\n').includes(HEREDOC_DELIMITER)) {
      throw new RenderError(path, `content contains the heredoc delimiter ${HEREDOC_DELIMITER}`);
    }

    const lines = [
      `mkdir -p "$(dirname '${path}')"`,
      `cat > '${path}' <<'${HEREDOC_DELIMITER}'`,
      body,
      HEREDOC_DELIMITER,
      `chmod ${options?.mode ?? '0644'} '${path}'`,
    ];
    if (options?.owner !== undefined) {
      lines.push(`chown ${options.owner} '${path}'`);
    }
    this.userData.addCommands(...lines);
    return this;
  }

  /**
   * Write a systemd unit for a long-running binary.
   */
  addSystemdService(service: SystemdServiceConfig): this {
    const unit = [
      '[Unit]',
      `Description=${service.description}`,
      `After=${service.after ?? 'network-online.target'}`,
      '',
      '[Service]',
      ...(service.user === undefined ? [] : [`User=${service.user}`]),
      `ExecStart=${service.execStart}`,
      'Restart=on-failure',
      '',
      '[Install]',
      'WantedBy=multi-user.target',
    ].join('\n');
    return this.writeFile(`/etc/systemd/system/${service.name}.service`, unit);
  }

  private addSystemUser(name: string): void {
    this.userData.addCommands(`id -u ${name} &> /dev/null || useradd --system --no-create-home --shell /sbin/nologin ${name}`);
  }

  installNodeExporter(version: string): this {
    const dir = `node_exporter-${version}.${ARCH}`;
    this.userData.addCommands(`
# Install node_exporter ${version}
curl -sSL "https://github.com/prometheus/node_exporter/releases/download/v${version}/${dir}.tar.gz" -o /tmp/node_exporter.tar.gz
tar -xzf /tmp/node_exporter.tar.gz -C /tmp
install -m 0755 /tmp/${dir}/node_exporter /usr/local/bin/node_exporter
rm -rf /tmp/node_exporter.tar.gz /tmp/${dir}`);
    this.addSystemUser('node_exporter');
    return this.addSystemdService({
      name: 'node_exporter',
      description: 'Prometheus node_exporter',
      execStart: '/usr/local/bin/node_exporter',
      user: 'node_exporter',
    });
  }

  installPrometheus(version: string): this {
    const dir = `prometheus-${version}.${ARCH}`;
    this.addSystemUser('prometheus');
    this.userData.addCommands(`
# Install Prometheus ${version}
curl -sSL "https://github.com/prometheus/prometheus/releases/download/v${version}/${dir}.tar.gz" -o /tmp/prometheus.tar.gz
tar -xzf /tmp/prometheus.tar.gz -C /tmp
install -m 0755 /tmp/${dir}/prometheus /tmp/${dir}/promtool /usr/local/bin/
mkdir -p /etc/prometheus /var/lib/prometheus
cp -r /tmp/${dir}/consoles /tmp/${dir}/console_libraries /etc/prometheus/
chown -R prometheus:prometheus /etc/prometheus /var/lib/prometheus
rm -rf /tmp/prometheus.tar.gz /tmp/${dir}`);
    return this.addSystemdService({
      name: 'prometheus',
      description: 'Prometheus server',
      execStart: '/usr/local/bin/prometheus --config.file=/etc/prometheus/prometheus.yml --storage.tsdb.path=/var/lib/prometheus --storage.tsdb.retention.time=15d',
      user: 'prometheus',
    });
  }

  /**
   * Install the CloudWatch exporter jar. It runs on port 9106 and reads
   * /etc/cloudwatch_exporter/config.yml.
   */
  installCloudWatchExporter(version: string): this {
    this.installPackages('java-17-amazon-corretto-headless');
    this.addSystemUser('cloudwatch_exporter');
    this.userData.addCommands(`
# Install CloudWatch exporter ${version}
mkdir -p /opt/cloudwatch_exporter /etc/cloudwatch_exporter
curl -sSL "https://github.com/prometheus/cloudwatch_exporter/releases/download/v${version}/cloudwatch_exporter-${version}-jar-with-dependencies.jar" \\
  -o /opt/cloudwatch_exporter/cloudwatch_exporter.jar`);
    return this.addSystemdService({
      name: 'cloudwatch_exporter',
      description: 'Prometheus CloudWatch exporter',
      execStart: '/usr/bin/java -jar /opt/cloudwatch_exporter/cloudwatch_exporter.jar 9106 /etc/cloudwatch_exporter/config.yml',
      user: 'cloudwatch_exporter',
    });
  }

  installGrafana(): this {
    this.writeFile('/etc/yum.repos.d/grafana.repo', [
      '[grafana]',
      'name=grafana',
      'baseurl=https://rpm.grafana.com',
      'repo_gpgcheck=1',
      'enabled=1',
      'gpgcheck=1',
      'gpgkey=https://rpm.grafana.com/gpg.key',
    ].join('\n'));
    return this.installPackages('grafana');
  }

  installTerraform(version: string): this {
    this.userData.addCommands(`
# Install Terraform ${version}
curl -sSL "https://releases.hashicorp.com/terraform/${version}/terraform_${version}_linux_amd64.zip" -o /tmp/terraform.zip
unzip -o -q /tmp/terraform.zip -d /usr/local/bin
rm -f /tmp/terraform.zip
echo "Terraform: $(terraform version | head -n 1)"`);
    return this;
  }

  /**
   * Install Jenkins LTS with Java 17 and pre-install the given plugins so
   * configuration-as-code can take over on first start.
   */
  installJenkins(plugins: string[], pluginManagerVersion = '2.13.0'): this {
    this.userData.addCommands(`
# Install Jenkins LTS
curl -sSL https://pkg.jenkins.io/redhat-stable/jenkins.repo -o /etc/yum.repos.d/jenkins.repo
rpm --import https://pkg.jenkins.io/redhat-stable/jenkins.io-2023.key
dnf install -y java-17-amazon-corretto-headless jenkins git`);

    if (plugins.length > 0) {
      this.writeFile('/var/lib/jenkins/plugins.txt', plugins.join('\n'), { owner: 'jenkins:jenkins' });
      this.userData.addCommands(`
# Pre-install Jenkins plugins
curl -sSL "https://github.com/jenkinsci/plugin-installation-manager-tool/releases/download/${pluginManagerVersion}/jenkins-plugin-manager-${pluginManagerVersion}.jar" \\
  -o /opt/jenkins-plugin-manager.jar
mkdir -p /var/lib/jenkins/plugins
java -jar /opt/jenkins-plugin-manager.jar \\
  --war /usr/share/java/jenkins.war \\
  --plugin-download-directory /var/lib/jenkins/plugins \\
  --plugin-file /var/lib/jenkins/plugins.txt
chown -R jenkins:jenkins /var/lib/jenkins/plugins`);
    }
    return this;
  }

  installElasticRepository(majorLine: string): this {
    this.userData.addCommands('rpm --import https://artifacts.elastic.co/GPG-KEY-elasticsearch');
    return this.writeFile('/etc/yum.repos.d/elastic.repo', [
      `[elastic-${majorLine}]`,
      `name=Elastic repository for ${majorLine} packages`,
      `baseurl=https://artifacts.elastic.co/packages/${majorLine}/yum`,
      'gpgcheck=1',
      'gpgkey=https://artifacts.elastic.co/GPG-KEY-elasticsearch',
      'enabled=1',
      'autorefresh=1',
      'type=rpm-md',
    ].join('\n'));
  }

  installElasticsearch(heapSize = '1g'): this {
    this.installPackages('elasticsearch');
    return this.writeFile('/etc/elasticsearch/jvm.options.d/heap.options', `-Xms${heapSize}\n-Xmx${heapSize}`);
  }

  installKibana(): this {
    return this.installPackages('kibana');
  }

  installFilebeat(): this {
    return this.installPackages('filebeat');
  }

  /**
   * Read a secret at boot and append it to a systemd EnvironmentFile.
   * Tracing is switched off around the lookup so the value never reaches
   * the user data log.
   */
  exportSecretToEnvironmentFile(config: SecretEnvironmentConfig): this {
    this.userData.addCommands(`
# Load ${config.variable} from Secrets Manager
set +x
SECRET_VALUE=$(aws secretsmanager get-secret-value \\
  --secret-id "${config.secretId}" \\
  --query SecretString --output text \\
  --region "${config.region}")
mkdir -p "$(dirname '${config.envFile}')"
touch '${config.envFile}'
chmod 0600 '${config.envFile}'
echo "${config.variable}=\${SECRET_VALUE}" >> '${config.envFile}'
unset SECRET_VALUE
set -x`);
    return this;
  }

  startServices(...services: string[]): this {
    this.userData.addCommands(
      'systemctl daemon-reload',
      ...services.map(service => `systemctl enable --now ${service}`),
    );
    return this;
  }

  addCustomScript(script: string): this {
    this.userData.addCommands(script);
    return this;
  }

  addCompletionMarker(): this {
    this.userData.addCommands(`
echo "=== User data script completed at $(date) ==="
touch /var/lib/cloud/instance/platform-bootstrap-complete`);
    return this;
  }
}
