/**
 * GUI Widgets
 *
 * Leaf widgets, layout containers and input components for `Gui`.
 */

export { Button, type ButtonResult } from "./Button";
export { Fill } from "./Fill";
export { Label } from "./Label";
export { Col, EmptyWidget, Inset, NoFill, Overlap, Padding, Row } from "./layout";
export { Selector, type SelectorOption, type SelectorResult } from "./Selector";
export { MessageBox, TextBox } from "./TextBox";
export {
  CARET_BLINK_RATE,
  TextEntry,
  type TextEntryOptions,
  type TextEntryResult,
} from "./TextEntry";
