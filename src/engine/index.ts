export * from "@/engine/Engine";
export * from "@/engine/commands";
export * from "@/engine/config";
export * from "@/engine/errors";
export * from "@/engine/formats";
export * from "@/engine/logger";
export * from "@/engine/machines/gameMachine";
export * from "@/engine/machines/roundMachine";
export * from "@/engine/ritual";
export * from "@/engine/rooms";
export * from "@/engine/rules/tiebreakers";
export * from "@/engine/selectors";
export * from "@/engine/serialization";
export * from "@/engine/standings";
export * from "@/engine/types";
export * from "@/engine/util";
export * from "@/engine/validation";
