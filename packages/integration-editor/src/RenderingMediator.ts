import { Topics, type EventBus } from "@sketchpad/event-bus";
import type { IShapeEditor, ShapePainter } from "@sketchpad/shape-kernel";

export class RenderingMediator {
  private unsubscribes: Array<() => void> = [];

  constructor(
    private readonly bus: EventBus,
    private readonly editor: IShapeEditor,
    private readonly painter: ShapePainter,
  ) {}

  attach() {
    this.unsubscribes.push(
      this.bus.subscribe(Topics.EDITOR_RENDER_REQUESTED, () => {
        this.editor.render(this.painter);
      }),
    );
  }

  detach() {
    for (const unsub of this.unsubscribes) unsub();
    this.unsubscribes = [];
  }
}
