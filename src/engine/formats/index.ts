export * from "@/engine/formats/history";
export * from "@/engine/formats/swiss";
export * from "@/engine/formats/teams";
export * from "@/engine/formats/types";
