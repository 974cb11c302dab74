import * as yaml from 'js-yaml';

export const ELASTICSEARCH_PORT = 9200;
export const KIBANA_PORT = 5601;

const dumpOptions: yaml.DumpOptions = { lineWidth: -1, noRefs: true };

/**
 * Single-node cluster reachable only from inside the VPC; security groups
 * do the access control.
 */
export function renderElasticsearchConfig(options: { clusterName: string }): string {
  return yaml.dump(
    {
      'cluster.name': options.clusterName,
      'network.host': '0.0.0.0',
      'http.port': ELASTICSEARCH_PORT,
      'discovery.type': 'single-node',
      'xpack.security.enabled': false,
      'path.data': '/var/lib/elasticsearch',
      'path.logs': '/var/log/elasticsearch',
    },
    dumpOptions,
  );
}

export function renderKibanaConfig(options: { elasticsearchUrl: string; serverName: string }): string {
  return yaml.dump(
    {
      'server.host': '0.0.0.0',
      'server.port': KIBANA_PORT,
      'server.name': options.serverName,
      'elasticsearch.hosts': [options.elasticsearchUrl],
    },
    dumpOptions,
  );
}

/**
 * Filebeat shipping the given log files straight to Elasticsearch.
 */
export function renderFilebeatConfig(options: { elasticsearchHost: string; paths: string[]; service: string }): string {
  return yaml.dump(
    {
      'filebeat.inputs': [
        {
          type: 'filestream',
          id: `${options.service}-logs`,
          paths: options.paths,
          fields: { service: options.service },
          fields_under_root: true,
        },
      ],
      'output.elasticsearch': {
        hosts: [`http://${options.elasticsearchHost}:${ELASTICSEARCH_PORT}`],
      },
    },
    dumpOptions,
  );
}
