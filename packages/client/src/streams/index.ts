export { InMemoryStreamStore, InMemoryStreamClient, createInMemoryStreamClient } from './memory.js'
export type {
	EventRead,
	StreamReader,
	StreamWriter,
	ReaderOptions,
	WriterOptions,
	StreamClient,
	StreamClientOptions,
	StreamClientFactory,
} from './types.js'
