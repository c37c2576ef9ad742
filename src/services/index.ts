export { verifyGatewaySettings, connectGateway } from "./setupService.js";
