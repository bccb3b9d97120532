export default function FinderLoading() {
  return (
    <div className="grid gap-8 lg:grid-cols-[320px_1fr]">
      <div className="space-y-4 rounded-3xl border border-slate-200 bg-white p-5 shadow-sm dark:border-slate-800 dark:bg-slate-900">
        <div className="h-5 w-40 rounded-full bg-slate-200 dark:bg-slate-800" />
        <div className="h-10 w-full rounded-xl bg-slate-100 dark:bg-slate-900" />
        <div className="grid grid-cols-3 gap-2">
          {Array.from({ length: 12 }).map((_, index) => (
            <div key={index} className="h-8 rounded-xl bg-slate-100 dark:bg-slate-900" />
          ))}
        </div>
      </div>

      <div className="space-y-4">
        <div className="h-6 w-48 rounded-full bg-slate-200 dark:bg-slate-800" />
        {Array.from({ length: 4 }).map((_, index) => (
          <div key={index} className="space-y-4 rounded-3xl border border-slate-200 bg-white p-6 shadow-sm dark:border-slate-800 dark:bg-slate-900">
            <div className="h-4 w-56 rounded-full bg-slate-200 dark:bg-slate-800" />
            <div className="flex flex-wrap gap-2">
              {Array.from({ length: 5 }).map((__, chipIndex) => (
                <div key={chipIndex} className="h-6 w-16 rounded-full bg-slate-100 dark:bg-slate-900" />
              ))}
            </div>
          </div>
        ))}
      </div>
    </div>
  );
}
