export { SocketDuplex } from "./socketDuplex.js";
export { FdWriteStream, SocketWriteStream } from "./writeStreams.js";
