import { Toaster } from 'sonner';
import ExtractorPage from './frontend/features/extractor/ExtractorPage';

function App() {
  return (
    <>
      <ExtractorPage />
      <Toaster
        richColors
        theme="dark"
        position="bottom-right"
        style={{ fontFamily: 'inherit' }}
      />
    </>
  );
}

export default App;
