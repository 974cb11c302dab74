import * as yaml from 'js-yaml';
import { renderElasticsearchConfig, renderFilebeatConfig, renderKibanaConfig } from '../lib/rendering/elastic';

describe('Elastic stack rendering', () => {
  test('renders a single-node Elasticsearch cluster', () => {
    expect(yaml.load(renderElasticsearchConfig({ clusterName: 'devops-platform-dev-logs' }))).toEqual({
      'cluster.name': 'devops-platform-dev-logs',
      'network.host': '0.0.0.0',
      'http.port': 9200,
      'discovery.type': 'single-node',
      'xpack.security.enabled': false,
      'path.data': '/var/lib/elasticsearch',
      'path.logs': '/var/log/elasticsearch',
    });
  });

  test('points Kibana at Elasticsearch', () => {
    expect(yaml.load(renderKibanaConfig({ elasticsearchUrl: 'http://localhost:9200', serverName: 'kibana' }))).toEqual({
      'server.host': '0.0.0.0',
      'server.port': 5601,
      'server.name': 'kibana',
      'elasticsearch.hosts': ['http://localhost:9200'],
    });
  });

  test('ships the given files through Filebeat', () => {
    const parsed = yaml.load(renderFilebeatConfig({
      elasticsearchHost: '10.0.0.40',
      paths: ['/var/log/user-data.log'],
      service: 'jenkins',
    }));

    expect(parsed).toEqual({
      'filebeat.inputs': [
        {
          type: 'filestream',
          id: 'jenkins-logs',
          paths: ['/var/log/user-data.log'],
          fields: { service: 'jenkins' },
          fields_under_root: true,
        },
      ],
      'output.elasticsearch': { hosts: ['http://10.0.0.40:9200'] },
    });
  });
});
