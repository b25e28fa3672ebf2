export default {
  source: 'owner/editor',
  version: 'stable',
  event: 'InsertEnter',
};
