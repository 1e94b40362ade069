import type { Tool, ToolType } from "../../tools/Tool.js";
import { SelectionTool } from "../../tools/SelectionTool.js";
import { DrawCircleTool } from "./DrawCircleTool.js";
import { DrawPathTool } from "./DrawPathTool.js";
import { DrawRectangleTool } from "./DrawRectangleTool.js";

export class DrawToolFactory {
  createTool(type: ToolType): Tool {
    switch (type) {
      case "none":
        return new SelectionTool();
      case "circle":
        return new DrawCircleTool();
      case "rectangle":
        return new DrawRectangleTool();
      case "path":
        return new DrawPathTool();
    }
  }
}
