export { EventChannel, type ChannelListener } from "./event-channel.js";
