export { MemoryOverrideFileSystem } from './memory_override_file_system';
