export { SendmailSink, StreamSink, parseCommandLine } from './sink.js';
export type { MailSink } from './sink.js';
