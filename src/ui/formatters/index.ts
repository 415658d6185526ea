export { formatResponse } from './response.js';
export { formatManifestSummary, summarizeManifest, type ManifestSummary } from './manifest.js';
