export { handleLegConnection } from './leg-connection.handler';
