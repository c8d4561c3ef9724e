export default {
  baseUrl: 'http://localhost:8080',
  testDir: './test',
  filePattern: '\\.(suite\\.(json|ya?ml)|postman_collection\\.json)$',
  rps: 0,
  timeout: 30,
  concurrency: 5,
  randomize: false,
  happy: false,
  filter: '',
  userAgent: 'probekit',
  verbose: false,
};
