export { downloadCommand } from './download.ts';
export { requestCommand } from './request.ts';
export { wsCommand } from './ws.ts';
