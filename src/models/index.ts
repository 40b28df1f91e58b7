export * from "@/models/base";
export * from "@/models/events";
export * from "@/models/match";
export * from "@/models/participant";
export * from "@/models/ritual";
export * from "@/models/round";
export * from "@/models/standing";
export * from "@/models/tournament";
