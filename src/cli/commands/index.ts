export { searchCommand } from './search';
export { recentCommand } from './recent';
export { appCommand } from './app';
export { statsCommand } from './stats';
export { rebuildIndexCommand } from './rebuildIndex';
export { addCommand } from './add';
export { captureCommand } from './capture';
export { consoleCommand } from './console';
export { configCommand } from './config';
