import { useEffect, useState } from 'react';
import type { ArtifactLoader } from '../data/artifact';
import type { CountyCollection } from '../types/county';

interface UseCountyDataResult {
  data: CountyCollection | null;
  loading: boolean;
  error: string | null;
}

export function useCountyData(loader: ArtifactLoader): UseCountyDataResult {
  const [data, setData] = useState<CountyCollection | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;

    loader
      .load()
      .then((collection) => {
        if (cancelled) return;
        setData(collection);
        setLoading(false);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err instanceof Error ? err.message : String(err));
        setLoading(false);
      });

    return () => {
      cancelled = true;
    };
  }, [loader]);

  return { data, loading, error };
}
