export default { source: 'owner/single' };
