export * from "./notifications/eventTypes.js";
export * from "./notifications/notificationId.js";
export * from "./notifications/request.js";
export * from "./notifications/dto.js";
export * from "./ingestionState.js";
