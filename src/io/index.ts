export { loadProjectFile, saveProjectFile } from './project-io.js';
export { loadLayoutFile } from './layout-io.js';
