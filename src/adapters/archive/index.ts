export { InMemoryArchiveAdapter } from './memory/in-memory-archive.adapter';
export { MongooseArchiveAdapter } from './mongoose/mongoose-archive.adapter';
export {
  EVENT_ARCHIVE_COLLECTION,
  STATUS_HISTORY_COLLECTION,
} from './mongoose/archive.schemas';
