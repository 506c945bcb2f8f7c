import { useState } from "react";
import { useChildren } from "./use-children";

/** The picked child, or the first one the account has. */
export function useActiveChild() {
  const childrenQuery = useChildren();
  const [pickedChildId, setPickedChildId] = useState<string | null>(null);
  const children = childrenQuery.data?.children ?? [];
  const activeChild = children.find((child) => child.id === pickedChildId) ?? children[0] ?? null;

  return {
    childrenQuery,
    children,
    activeChild,
    setActiveChildId: setPickedChildId,
  };
}
