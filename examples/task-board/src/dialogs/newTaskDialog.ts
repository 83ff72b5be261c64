import { Button, DialogFrame, StackPanel, TextInput, type UiContext } from "@termloom/core";
import { BoardActions, TASK_TITLE_MAX } from "../helpers/state.js";

/**
 * Title prompt. Enter in the input or the Add button dispatches tasks.add;
 * a rejected title stays in the input and is reported as an error toast.
 */
export class NewTaskDialog extends DialogFrame {
  readonly input: TextInput;

  constructor() {
    super({ id: "new-task", title: "New task", width: 40, height: 5, spacing: 1, stretch: true });
    this.input = this.addChild(
      new TextInput({
        id: "new-task-title",
        placeholder: "What needs doing?",
        maxLength: TASK_TITLE_MAX,
        onSubmit: (_value, ctx) => {
          this.submit(ctx);
        },
      }),
    );
    const buttons = this.addChild(new StackPanel({ orientation: "horizontal", spacing: 2, height: 1 }));
    buttons.addChild(
      new Button({
        id: "new-task-add",
        label: "Add",
        onPress: (ctx) => {
          this.submit(ctx);
        },
      }),
    );
    buttons.addChild(
      new Button({
        id: "new-task-cancel",
        label: "Cancel",
        onPress: (ctx) => {
          ctx.navigator.closeDialog();
        },
      }),
    );
  }

  submit(ctx: UiContext): void {
    const title = this.input.value.trim();
    const result = ctx.dispatch(BoardActions.add, { title });
    if (!result.success) {
      ctx.notify(result.error ?? "could not add task", { level: "error" });
      return;
    }
    ctx.navigator.closeDialog();
    ctx.notify(`Added "${title}"`, { level: "success" });
  }
}
