interface LoadingSkeletonProps {
  className?: string;
  ariaLabel?: string;
}

function joinClassNames(...names: Array<string | undefined>): string {
  return names.filter(Boolean).join(' ');
}

export function LoadingSkeleton({ className, ariaLabel = 'Loading' }: LoadingSkeletonProps) {
  return <div className={joinClassNames('skeleton', className)} aria-label={ariaLabel} aria-busy="true" />;
}
