export { composeFooter } from './footer';
export { LineDrawer, type DrawColumnRequest, type DrawLineRequest } from './line-drawer';
export { RenderedLinesBuffer } from './rendered-lines-buffer';
export { composeLine, sgrCodesFor, styleText, SGR, SGR_RESET, type ComposedLine } from './styles';
export { DEFAULT_MESSAGE_DURATION_MS, TransientMessage } from './transient-message';
