export { DomInputTransport } from './dom-transport';
export { BrowserClipboard } from './browser-clipboard';
