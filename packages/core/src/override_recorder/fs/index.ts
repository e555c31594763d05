export { FsOverrideFileSystem } from './fs_override_file_system';
export type { FsOverrideFileSystemOptions } from './fs_override_file_system';
