export type PageLifecycleHandlers = {
  /** The page is being unloaded or frozen into the back/forward cache. */
  onHide: () => void;
  /** The page came back from the back/forward cache. */
  onRestore: () => void;
};

export function watchPageLifecycle(target: Window, handlers: PageLifecycleHandlers): () => void {
  const onPageHide = () => handlers.onHide();
  const onPageShow = (e: PageTransitionEvent) => {
    // The first load also fires pageshow, with persisted = false.
    if (e.persisted) handlers.onRestore();
  };

  target.addEventListener('pagehide', onPageHide);
  target.addEventListener('pageshow', onPageShow);
  return () => {
    target.removeEventListener('pagehide', onPageHide);
    target.removeEventListener('pageshow', onPageShow);
  };
}
